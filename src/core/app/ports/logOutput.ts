import type { LogWriteRequest } from './logBuilder';

export interface LogOutput {
  writeLog(request: LogWriteRequest): void;
}
