/**
 * S3 operations
 */

import {
  CreateBucketCommand,
  CreateBucketCommandInput,
  CreateBucketCommandOutput,
  DeleteBucketCommand,
  DeleteBucketCommandInput,
  DeleteBucketCommandOutput,
  DeleteObjectCommand,
  DeleteObjectCommandInput,
  DeleteObjectCommandOutput,
  GetBucketPolicyCommand,
  GetBucketPolicyCommandInput,
  GetBucketPolicyCommandOutput,
  GetObjectCommand,
  GetObjectCommandInput,
  ListBucketsCommand,
  ListBucketsCommandInput,
  ListBucketsCommandOutput,
  ListObjectsV2Command,
  ListObjectsV2CommandInput,
  ListObjectsV2CommandOutput,
  PutBucketPolicyCommand,
  PutBucketPolicyCommandInput,
  PutBucketPolicyCommandOutput,
  PutObjectCommand,
  PutObjectCommandInput,
  PutObjectCommandOutput,
  S3Client,
} from '@aws-sdk/client-s3';
import { Operation, ProviderClient, SdkProvider } from '../../gateway/index.js';
import { ServiceConfig } from '../../types.js';
import { awsClientSettings } from '../aws.js';

/**
 * The part of a GetObject response the download tool reads
 */
export interface ObjectDownload {
  Body?: {
    transformToByteArray(): Promise<Uint8Array>;
  };
}

export interface S3Operations {
  ListBuckets: Operation<ListBucketsCommandInput, ListBucketsCommandOutput>;
  CreateBucket: Operation<CreateBucketCommandInput, CreateBucketCommandOutput>;
  DeleteBucket: Operation<DeleteBucketCommandInput, DeleteBucketCommandOutput>;
  ListObjectsV2: Operation<ListObjectsV2CommandInput, ListObjectsV2CommandOutput>;
  PutObject: Operation<PutObjectCommandInput, PutObjectCommandOutput>;
  GetObject: Operation<GetObjectCommandInput, ObjectDownload>;
  DeleteObject: Operation<DeleteObjectCommandInput, DeleteObjectCommandOutput>;
  GetBucketPolicy: Operation<GetBucketPolicyCommandInput, GetBucketPolicyCommandOutput>;
  PutBucketPolicy: Operation<PutBucketPolicyCommandInput, PutBucketPolicyCommandOutput>;
}

export function createS3Provider(config: ServiceConfig): ProviderClient<S3Operations> {
  // Path-style addressing keeps custom endpoints (local S3 stand-ins) working
  const client = new S3Client({ ...awsClientSettings(config), forcePathStyle: config.endpoint !== undefined });

  return new SdkProvider<S3Operations>('s3', {
    ListBuckets: (input) => client.send(new ListBucketsCommand(input)),
    CreateBucket: (input) => client.send(new CreateBucketCommand(input)),
    DeleteBucket: (input) => client.send(new DeleteBucketCommand(input)),
    ListObjectsV2: (input) => client.send(new ListObjectsV2Command(input)),
    PutObject: (input) => client.send(new PutObjectCommand(input)),
    GetObject: (input) => client.send(new GetObjectCommand(input)),
    DeleteObject: (input) => client.send(new DeleteObjectCommand(input)),
    GetBucketPolicy: (input) => client.send(new GetBucketPolicyCommand(input)),
    PutBucketPolicy: (input) => client.send(new PutBucketPolicyCommand(input)),
  });
}
