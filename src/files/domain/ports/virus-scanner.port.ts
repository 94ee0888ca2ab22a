import { Readable } from 'stream';

export interface ScanResult {
  isClean: boolean;
  message: string;
}

export abstract class VirusScannerPort {
  abstract scan(content: Readable): Promise<ScanResult>;
}
