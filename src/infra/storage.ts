import { chmodSync, existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import type { IStorage } from '../types/interfaces.js';

export class FileStorage implements IStorage {
  readFile(path: string, encoding: BufferEncoding): string {
    return readFileSync(path, encoding);
  }

  writeFile(path: string, data: string): void {
    writeFileSync(path, data);
  }

  chmod(path: string, mode: number): void {
    chmodSync(path, mode);
  }

  exists(path: string): boolean {
    return existsSync(path);
  }

  mkdirp(path: string): void {
    mkdirSync(path, { recursive: true });
  }
}
