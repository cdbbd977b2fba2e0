/**
 * Writer Configuration
 * 
 * Reads and validates `config.json` from the data directory.
 *
 * Priority order for host and port:
 * 1. Image parameters (`sftp_host`, `sftp_port`)
 * 2. Configuration parameters (`hostname`, `port`)
 */

import { join } from 'node:path';
import { z } from 'zod';
import { safeReadFile, DEFAULT_TIMESTAMP_FORMAT } from '@sftp-writer/utils';
import { ConfigurationError } from '../errors/index.js';

export const CONFIG_FILE_NAME = 'config.json';

const portSchema = z.union([
  z.number().int().min(1).max(65535),
  z.string().regex(/^\d+$/, 'must be a number').transform(Number),
]);

const parametersSchema = z.object({
  user: z.string().min(1),
  '#pass': z.string().optional(),
  '#private_key': z.string().optional(),
  hostname: z.string().min(1).optional(),
  port: portSchema.optional(),
  path: z.string().min(1),
  append_date: z.union([z.boolean(), z.literal(0), z.literal(1)]).transform(Boolean).default(false),
  append_date_format: z.string().min(1).default(DEFAULT_TIMESTAMP_FORMAT),
  debug: z.boolean().default(false),
}).superRefine((params, ctx) => {
  const hasPassword = (params['#pass'] ?? '') !== '';
  const hasKey = (params['#private_key'] ?? '').trim() !== '';
  if (!hasPassword && !hasKey) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['#pass'],
      message: 'one of #pass or #private_key is required',
    });
  }
});

const imageParametersSchema = z.object({
  sftp_host: z.string().min(1),
  sftp_port: portSchema,
}).passthrough();

const configFileSchema = z.object({
  parameters: parametersSchema,
  image_parameters: z.record(z.unknown()).default({}),
});

export type WriterParameters = z.infer<typeof parametersSchema>;

export interface WriterConfig {
  user: string;
  password?: string;
  privateKey?: string;
  host: string;
  port: number;
  remotePath: string;
  appendDate: boolean;
  appendDateFormat: string;
  debug: boolean;
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

/**
 * Validate an already-parsed configuration document
 */
export function parseWriterConfig(raw: unknown): WriterConfig {
  const parsed = configFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError('Invalid configuration', formatIssues(parsed.error));
  }

  const { parameters, image_parameters: imageParameters } = parsed.data;

  let host: string;
  let port: number;

  if (Object.keys(imageParameters).length > 0) {
    const image = imageParametersSchema.safeParse(imageParameters);
    if (!image.success) {
      throw new ConfigurationError('Invalid image parameters', formatIssues(image.error));
    }
    host = image.data.sftp_host;
    port = image.data.sftp_port;
  } else {
    const missing = [
      parameters.hostname === undefined ? 'hostname: Required' : undefined,
      parameters.port === undefined ? 'port: Required' : undefined,
    ].filter((issue): issue is string => issue !== undefined);

    if (parameters.hostname === undefined || parameters.port === undefined) {
      throw new ConfigurationError('Invalid configuration', missing);
    }
    host = parameters.hostname;
    port = parameters.port;
  }

  return {
    user: parameters.user,
    password: parameters['#pass'] || undefined,
    privateKey: parameters['#private_key'] || undefined,
    host,
    port,
    remotePath: parameters.path,
    appendDate: parameters.append_date,
    appendDateFormat: parameters.append_date_format,
    debug: parameters.debug,
  };
}

/**
 * Load `config.json` from the data directory
 */
export async function loadWriterConfig(dataDir: string): Promise<WriterConfig> {
  const configPath = join(dataDir, CONFIG_FILE_NAME);
  const content = await safeReadFile(configPath);

  if (content === null) {
    throw new ConfigurationError(`Configuration file not found: ${configPath}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new ConfigurationError(`Configuration file is not valid JSON: ${configPath}`, [], error);
  }

  return parseWriterConfig(raw);
}
