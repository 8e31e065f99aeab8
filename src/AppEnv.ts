import type { StatusSink } from './Hardware/StatusSink';
import type { ScanService } from './Service/ScanService';
import type { MappingStore } from './Store/MappingStore';
import type { ScanLog } from './Store/ScanLog';
import type { TaskStore } from './Store/TaskStore';
import type { Mutex } from './Util/Mutex';

export interface AuthSettings {
	authToken: string;
	nfcPublic: boolean;
}

export interface Services {
	auth: AuthSettings;
	tasks: TaskStore;
	mappings: MappingStore;
	pings: ScanLog;
	scanner: ScanService;
	sink: StatusSink;
	// ストアを書き換える処理はすべてこのロックの中で行う
	mutex: Mutex;
}

export interface Variables {
	services: Services;
}

export type AppEnv = { Variables: Variables };
