import { z } from 'zod/v4';

import { ConfigError } from './errors';

import type { ErrorDetail } from '@/lib/errors/error';
import type { VsphereFileParams } from './types';

export const DESIRED_STATES = ['absent', 'directory', 'file', 'touch'] as const;

// An unpaired UTF-16 surrogate cannot be percent-encoded into the datastore URL.
const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

const datastoreText = z
  .string()
  .min(1)
  .refine((value) => !LONE_SURROGATE.test(value), { message: 'contains an unpaired surrogate' });

const ParamsSchema = z.object({
  host: z.string().trim().min(1),
  port: z.number().int().min(1).max(65535).default(443),
  username: z.string().min(1),
  password: z.string().min(1),
  datacenter: datastoreText,
  datastore: datastoreText,
  path: datastoreText,
  state: z.enum(DESIRED_STATES).default('file'),
  timeout: z.number().int().positive().default(10),
  validate_certs: z.boolean().default(true),
});

const RequestSchema = z.object({
  schema_version: z.literal('vsphere-file-request-v1'),
  check_mode: z.boolean().default(false),
  params: z.record(z.string(), z.unknown()),
});

export type ParsedRequest = {
  checkMode: boolean;
  params: VsphereFileParams;
};

export type EnvFallbacks = {
  VMWARE_HOST?: string;
  VMWARE_USER?: string;
  VMWARE_PASSWORD?: string;
  VMWARE_PORT?: number;
  VMWARE_VALIDATE_CERTS?: boolean;
};

function toDetails(issues: z.ZodError['issues'], prefix: string): ErrorDetail[] {
  return issues.map((issue) => ({
    field: [prefix, ...issue.path.map(String)].filter(Boolean).join('.'),
    issue: issue.code,
    message: issue.message,
  }));
}

function pick(raw: Record<string, unknown>, name: string, alias?: string): unknown {
  if (raw[name] !== undefined) return raw[name];
  return alias === undefined ? undefined : raw[alias];
}

export function resolveParams(raw: Record<string, unknown>, env: EnvFallbacks): VsphereFileParams {
  const candidate = {
    ...raw,
    host: pick(raw, 'host', 'hostname') ?? env.VMWARE_HOST,
    username: pick(raw, 'username') ?? env.VMWARE_USER,
    password: pick(raw, 'password') ?? env.VMWARE_PASSWORD,
    port: pick(raw, 'port') ?? env.VMWARE_PORT,
    validate_certs: pick(raw, 'validate_certs') ?? env.VMWARE_VALIDATE_CERTS,
    path: pick(raw, 'path', 'dest'),
  };

  const parsed = ParamsSchema.safeParse(candidate);
  if (!parsed.success) {
    const details = toDetails(parsed.error.issues, 'params');
    throw new ConfigError(`invalid params: ${details.map((d) => d.field).join(', ')}`, { details });
  }
  return parsed.data;
}

export function parseRequest(input: unknown, env: EnvFallbacks): ParsedRequest {
  const parsed = RequestSchema.safeParse(input);
  if (!parsed.success) {
    const details = toDetails(parsed.error.issues, '');
    throw new ConfigError(`invalid request: ${details.map((d) => d.field || '(root)').join(', ')}`, { details });
  }

  return { checkMode: parsed.data.check_mode, params: resolveParams(parsed.data.params, env) };
}
