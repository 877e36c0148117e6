import { promises as fs } from 'fs';
import { Mesh, type BufferGeometry } from 'three';
import { STLLoader } from 'three/examples/jsm/loaders/STLLoader.js';
import { STLExporter } from 'three/examples/jsm/exporters/STLExporter.js';
import { AppError, describeError } from '../middleware/error.js';
import { nextFreePath } from '../fs/files.js';

export async function loadStl(file: string): Promise<BufferGeometry> {
	const data = await fs.readFile(file);
	const buffer = new ArrayBuffer(data.byteLength);
	new Uint8Array(buffer).set(data);
	return new STLLoader().parse(buffer);
}

export function toBinaryStl(geometry: BufferGeometry): Uint8Array {
	const mesh = new Mesh(geometry);
	mesh.updateMatrixWorld();
	const view = new STLExporter().parse(mesh, { binary: true });
	return new Uint8Array(view.buffer, view.byteOffset, view.byteLength);
}

export function minZ(geometry: BufferGeometry): number {
	geometry.computeBoundingBox();
	const z = geometry.boundingBox?.min.z;
	if (z === undefined || !Number.isFinite(z)) {
		throw new Error('Mesh has no vertices');
	}
	return z;
}

/**
 * Moves the mesh in `inputFile` so that its lowest point sits at Z = 0 and
 * saves it as the next free `translated_<i>.stl` in `workdir`.
 */
export async function adjustHeight(inputFile: string, workdir: string): Promise<string> {
	try {
		const outputFile = await nextFreePath(workdir, 'translated', '.stl');
		const geometry = await loadStl(inputFile);

		geometry.translate(0, 0, -minZ(geometry));
		console.log('Translated, new Z min:', minZ(geometry));

		await fs.writeFile(outputFile, toBinaryStl(geometry));
		return outputFile;
	} catch (error) {
		throw new AppError(500, `Couldn't adjust height of file ${inputFile}`, describeError(error));
	}
}
