/**
 * S3 tools: buckets, objects and bucket policies
 */

import { BucketLocationConstraint, CreateBucketCommandInput, ListObjectsV2CommandInput } from '@aws-sdk/client-s3';
import { z } from 'zod';
import {
  andThen,
  bodyOrStatus,
  buildRequest,
  invalid,
  mapOutcome,
  ProviderClient,
  success,
  stripMetadata,
  ToolFactory,
  ToolOutcome,
  ToolRegistry,
} from '../../gateway/index.js';
import { S3Operations } from './operations.js';
import { expandHome, withFileStream, writeLocalFile } from './local-files.js';

/** Region whose buckets are created without a location constraint */
const DEFAULT_BUCKET_REGION = 'us-east-1';

const LOCATION_CONSTRAINTS = new Set<string>(Object.values(BucketLocationConstraint));

function isLocationConstraint(region: string): region is BucketLocationConstraint {
  return LOCATION_CONSTRAINTS.has(region);
}

function isJson(text: string): boolean {
  try {
    JSON.parse(text);
    return true;
  } catch {
    return false;
  }
}

const bucketName = z.string().min(1).describe('Bucket name');
const objectKey = z.string().min(1).describe('Object key');

export interface S3ToolDefaults {
  /** Region used by create_bucket when the caller names none */
  region: string;
}

export function registerS3Tools(
  registry: ToolRegistry,
  provider: ProviderClient<S3Operations>,
  defaults: S3ToolDefaults
): void {
  const tools = new ToolFactory<S3Operations>(registry, provider);

  tools
    .tool('list_buckets', 'List all S3 buckets in the account', {})
    .call(
      'ListBuckets',
      () => ({}),
      (output) => success(output.Buckets ?? [])
    );

  tools
    .tool('create_bucket', 'Create a new S3 bucket', {
      bucket_name: bucketName,
      region: z.string().min(1).optional().describe('Bucket region; defaults to the server region'),
    })
    .handle(async ({ bucket_name, region }) => {
      const target = region ?? defaults.region;
      const request = buildRequest<CreateBucketCommandInput>({ Bucket: bucket_name });
      if (target !== DEFAULT_BUCKET_REGION) {
        if (!isLocationConstraint(target)) {
          return invalid(`Unsupported bucket region: ${target}`, 'region');
        }
        request.set('CreateBucketConfiguration', { LocationConstraint: target });
      }
      return mapOutcome(await tools.call('CreateBucket', request.build()), stripMetadata);
    });

  tools
    .tool('delete_bucket', 'Delete an S3 bucket', { bucket_name: bucketName })
    .call(
      'DeleteBucket',
      ({ bucket_name }) => ({ Bucket: bucket_name }),
      (output) => success(bodyOrStatus(output, 'Bucket deletion initiated'))
    );

  tools
    .tool('list_objects', 'List objects within an S3 bucket', {
      bucket_name: bucketName,
      prefix: z.string().optional(),
    })
    .drain(
      'ListObjectsV2',
      ({ bucket_name, prefix }, cursor) =>
        buildRequest<ListObjectsV2CommandInput>({ Bucket: bucket_name })
          .set('Prefix', prefix)
          .set('ContinuationToken', cursor)
          .build(),
      (output) => ({
        items: output.Contents,
        nextToken: output.IsTruncated ? output.NextContinuationToken : undefined,
      })
    );

  tools
    .tool('upload_object', 'Upload an object to S3 from a file or inline content', {
      bucket_name: bucketName,
      object_key: objectKey,
      file_path: z.string().min(1).optional().describe('Local file to upload'),
      content: z.string().optional().describe('Inline object content'),
      is_base64: z.boolean().default(false).describe('Decode content from base64 before upload'),
    })
    .handle(async (args): Promise<ToolOutcome> => {
      const target = { Bucket: args.bucket_name, Key: args.object_key };
      let uploaded: ToolOutcome;
      if (args.file_path !== undefined) {
        uploaded = await withFileStream(expandHome(args.file_path), ({ body, size }) =>
          tools.call('PutObject', { ...target, Body: body, ContentLength: size })
        );
      } else if (args.content !== undefined) {
        const data = Buffer.from(args.content, args.is_base64 ? 'base64' : 'utf8');
        uploaded = await tools.call('PutObject', { ...target, Body: data });
      } else {
        return invalid('Either file_path or content must be provided', 'file_path');
      }
      return mapOutcome(uploaded, () => ({ bucket: args.bucket_name, key: args.object_key }));
    });

  tools
    .tool('download_object', 'Download an object from S3 to the local filesystem', {
      bucket_name: bucketName,
      object_key: objectKey,
      destination_path: z.string().min(1).describe('Local file to write'),
    })
    .handle(async ({ bucket_name, object_key, destination_path }) => {
      const destination = expandHome(destination_path);
      const fetched = await tools.call('GetObject', { Bucket: bucket_name, Key: object_key });
      return andThen(fetched, async (output) => {
        const data = output.Body ? await output.Body.transformToByteArray() : new Uint8Array();
        await writeLocalFile(destination, data);
        return success({ message: `Object saved to ${destination}` });
      });
    });

  tools
    .tool('delete_object', 'Delete an object from S3', { bucket_name: bucketName, object_key: objectKey })
    .call('DeleteObject', ({ bucket_name, object_key }) => ({ Bucket: bucket_name, Key: object_key }));

  tools
    .tool('get_bucket_policy', 'Retrieve the policy for an S3 bucket', { bucket_name: bucketName })
    .handle(async ({ bucket_name }) => {
      const fetched = await tools.call('GetBucketPolicy', { Bucket: bucket_name });
      if (fetched.kind === 'provider' && fetched.error.code === 'NoSuchBucketPolicy') {
        return success({ message: 'Bucket policy not found' });
      }
      return mapOutcome(fetched, (output): unknown => JSON.parse(output.Policy ?? '{}'));
    });

  tools
    .tool('set_bucket_policy', 'Set the policy for an S3 bucket', {
      bucket_name: bucketName,
      policy_json: z.string().refine(isJson, { message: 'Policy must be valid JSON' }),
    })
    .call(
      'PutBucketPolicy',
      ({ bucket_name, policy_json }) => ({ Bucket: bucket_name, Policy: policy_json }),
      () => success({ message: 'Bucket policy updated' })
    );
}
