import { S3Client } from '@aws-sdk/client-s3';
import { getRuntimeConfig, RuntimeConfig } from '../config/runtimeConfig';
import { FileObjectStore } from './fileObjectStore';
import { ObjectStore } from './objectStore';
import { S3ObjectStore } from './s3ObjectStore';

/** Build the object store selected by `store.driver` (CATALOG_STORE_DRIVER). */
export function createObjectStore(config: RuntimeConfig['store'] = getRuntimeConfig().store): ObjectStore {
  switch(config.driver){
    case 'file':
      return new FileObjectStore(config.rootDir);
    case 's3': {
      const { bucket, region, endpoint, forcePathStyle } = config.s3;
      if(!bucket) throw new Error('CATALOG_S3_BUCKET is required for the s3 store driver');
      // Credentials resolve through the SDK's default provider chain (env, profile, instance role).
      const client = new S3Client({ region, endpoint, forcePathStyle });
      return new S3ObjectStore(client, bucket);
    }
  }
}
