import fs from 'fs';
import { createApp } from './app.js';
import { DEBUG_LOGGING, ENV, PORT, UPLOAD_DIR } from './config.js';

fs.mkdirSync(UPLOAD_DIR, { recursive: true });

if (DEBUG_LOGGING) console.log(`Upload directory: ${UPLOAD_DIR}`);

createApp().listen(PORT, () => {
	console.log(`Server is running on port ${PORT}, environment: ${ENV}`);
});
