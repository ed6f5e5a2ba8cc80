import { copyFile, mkdir, readFile, writeFile } from 'fs/promises';
import path from 'path';
import {
  CopyObjectCommand,
  GetObjectCommand,
  ListObjectsV2Command,
  ListObjectsV2CommandOutput,
  PutObjectCommand,
  S3Client,
} from '@aws-sdk/client-s3';
import { applyListOptions, asPrefix, CopyEndpoint, ListOptions, ObjectStore } from './objectStore';

/**
 * Object store over one S3 bucket. Listing uses '/' as delimiter so that
 * "folders" come back as common prefixes, matching FileObjectStore.
 */
export class S3ObjectStore implements ObjectStore {
  constructor(private readonly client: S3Client, private readonly bucket: string) {}

  async list(prefix: string, options?: ListOptions): Promise<string[]> {
    const base = asPrefix(prefix);
    const keys: string[] = [];
    let token: string | undefined;
    do {
      const page: ListObjectsV2CommandOutput = await this.client.send(new ListObjectsV2Command({
        Bucket: this.bucket,
        Prefix: base,
        Delimiter: '/',
        ContinuationToken: token,
      }));
      for(const p of page.CommonPrefixes ?? []){
        if(p.Prefix) keys.push(p.Prefix);
      }
      for(const obj of page.Contents ?? []){
        // S3 consoles create zero-byte "folder" markers equal to the prefix itself
        if(obj.Key && obj.Key !== base) keys.push(obj.Key);
      }
      token = page.IsTruncated ? page.NextContinuationToken : undefined;
    } while(token);
    return applyListOptions(keys.sort(), options);
  }

  isPrefix(key: string): boolean {
    return key.endsWith('/');
  }

  async copy(source: CopyEndpoint, destination: CopyEndpoint): Promise<string> {
    if(source.kind === 'local' && destination.kind === 'local'){
      await mkdir(path.dirname(destination.path), { recursive: true });
      await copyFile(source.path, destination.path);
      return destination.path;
    }
    if(source.kind === 'local' && destination.kind === 'store'){
      const body = await readFile(source.path);
      await this.client.send(new PutObjectCommand({ Bucket: this.bucket, Key: destination.key, Body: body }));
      return destination.key;
    }
    if(source.kind === 'store' && destination.kind === 'local'){
      const body = await this.readRaw(source.key);
      await mkdir(path.dirname(destination.path), { recursive: true });
      await writeFile(destination.path, body);
      return destination.path;
    }
    if(source.kind === 'store' && destination.kind === 'store'){
      await this.client.send(new CopyObjectCommand({
        Bucket: this.bucket,
        Key: destination.key,
        CopySource: `${this.bucket}/${encodeURIComponent(source.key)}`,
      }));
      return destination.key;
    }
    throw new Error('unreachable copy endpoint combination');
  }

  async readText(key: string): Promise<string> {
    const response = await this.client.send(new GetObjectCommand({ Bucket: this.bucket, Key: key }));
    if(!response.Body) throw new Error(`Empty body for s3://${this.bucket}/${key}`);
    return response.Body.transformToString('utf-8');
  }

  async readRaw(key: string): Promise<Buffer> {
    const response = await this.client.send(new GetObjectCommand({ Bucket: this.bucket, Key: key }));
    if(!response.Body) throw new Error(`Empty body for s3://${this.bucket}/${key}`);
    return Buffer.from(await response.Body.transformToByteArray());
  }
}
