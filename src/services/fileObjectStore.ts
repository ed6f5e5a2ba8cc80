import { copyFile, mkdir, readFile, readdir } from 'fs/promises';
import path from 'path';
import { applyListOptions, asPrefix, CopyEndpoint, ListOptions, ObjectStore } from './objectStore';

/**
 * Object store backed by a local directory. Keys are paths relative to `rootDir`;
 * sub-directories list as prefixes ending in '/'.
 */
export class FileObjectStore implements ObjectStore {
  constructor(private readonly rootDir: string) {}

  async list(prefix: string, options?: ListOptions): Promise<string[]> {
    const base = asPrefix(prefix);
    const dirents = await readdir(this.resolvePath(base), { withFileTypes: true });
    const keys = dirents
      .map(d => base + d.name + (d.isDirectory() ? '/' : ''))
      .sort();
    return applyListOptions(keys, options);
  }

  isPrefix(key: string): boolean {
    return key.endsWith('/');
  }

  async copy(source: CopyEndpoint, destination: CopyEndpoint): Promise<string> {
    const from = this.toFsPath(source);
    const to = this.toFsPath(destination);
    await mkdir(path.dirname(to), { recursive: true });
    await copyFile(from, to);
    return destination.kind === 'local' ? destination.path : destination.key;
  }

  async readText(key: string): Promise<string> {
    return readFile(this.resolvePath(key), 'utf8');
  }

  async readRaw(key: string): Promise<Buffer> {
    return readFile(this.resolvePath(key));
  }

  private toFsPath(endpoint: CopyEndpoint): string {
    return endpoint.kind === 'local' ? endpoint.path : this.resolvePath(endpoint.key);
  }

  private resolvePath(key: string): string {
    const normalized = key.replace(/^\/+/, '');
    return path.resolve(this.rootDir, normalized);
  }
}
