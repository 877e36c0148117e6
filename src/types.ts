export type FilamentInfo = {
	used_mm?: string;
	used_cm3?: string;
	used_g?: string;
	cost?: string;
};

export type PrintTimes = {
	normal: string;
	silent?: string;
};

export type SlicingResult = {
	id: string;
	gcodeFilename: string;
	gcodeSize: number;
	gcodeUrl: string;
	unprintability: number;
	times: PrintTimes;
	printSeconds: number;
	filament: FilamentInfo;
};

export type PrinterProfile = {
	name: string;
	printerModel: string;
	filamentType: string;
	layerHeight: string;
	bed: {
		x1: number;
		x2: number;
		y1: number;
		y2: number;
	};
	bedCenter: [number, number];
};
