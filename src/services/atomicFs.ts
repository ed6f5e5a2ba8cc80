import fs from 'fs';
import path from 'path';
import crypto from 'crypto';
import { getRuntimeConfig } from '../config/runtimeConfig';

const TRANSIENT_CODES = new Set(['EPERM', 'EBUSY', 'EACCES']);

function isTransient(err: unknown, alsoTransient: string[] = []): boolean {
  const code = (err as NodeJS.ErrnoException).code;
  return code !== undefined && (TRANSIENT_CODES.has(code) || alsoTransient.includes(code));
}

function removeQuietly(file: string): void {
  try { if(fs.existsSync(file)) fs.unlinkSync(file); } catch { /* temp file already gone */ }
}

function backoff(baseMs: number, attempt: number): void {
  const sleepMs = baseMs * Math.pow(2, attempt-1) + Math.floor(Math.random()*baseMs);
  const start = Date.now();
  while(Date.now()-start < sleepMs){ /* busy-wait tiny backoff (short durations) */ }
}

/**
 * Atomically replace `filePath` with the JSON encoding of `obj`.
 *
 * Content is written to a unique temp file in the same directory and renamed over the
 * destination, so readers see either the previous snapshot or the new one. Transient
 * EPERM / EBUSY / EACCES failures (virus scanners, network filesystems) are retried with
 * exponential backoff; the final error propagates.
 *
 * Attempts and base backoff come from `atomicFs.retries` / `atomicFs.backoffMs`
 * (CATALOG_ATOMIC_WRITE_RETRIES, CATALOG_ATOMIC_WRITE_BACKOFF_MS).
 */
export function atomicWriteJson(filePath: string, obj: unknown){
  const dir = path.dirname(filePath);
  if(!fs.existsSync(dir)) fs.mkdirSync(dir,{recursive:true});
  const data = JSON.stringify(obj,null,2);
  const atomicConfig = getRuntimeConfig().atomicFs;
  const maxAttempts = Math.max(1, atomicConfig.retries);
  const baseBackoff = Math.max(1, atomicConfig.backoffMs);
  let lastErr: unknown = null;
  for(let attempt=1; attempt<=maxAttempts; attempt++){
    const tmp = path.join(dir, `.${path.basename(filePath)}.${crypto.randomBytes(6).toString('hex')}.tmp`);
    try {
      fs.writeFileSync(tmp, data, 'utf8');
      fs.renameSync(tmp, filePath);
      return;
    } catch(err){
      lastErr = err;
      removeQuietly(tmp);
      if(!isTransient(err, ['ENOENT']) || attempt===maxAttempts) break;
      backoff(baseBackoff, attempt);
    }
  }
  throw lastErr instanceof Error ? lastErr : new Error(`atomicWriteJson failed for ${filePath}`);
}
