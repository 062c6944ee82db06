import { z } from 'zod/v4';

import { createEnv } from '@t3-oss/env-core';

const booleanFlag = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum(['true', 'false', '1', '0']))
  .transform((value) => value === 'true' || value === '1');

export function loadRuntimeEnv(source: Record<string, string | undefined> = process.env) {
  return createEnv({
    server: {
      NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),

      VSPHERE_FILE_LOG_LEVEL: z.enum(['debug', 'info', 'error']).default('info'),
      VSPHERE_FILE_TASK_POLL_MS: z.coerce.number().int().positive().default(500),
      // Unset means task polling waits until the task reaches a terminal state.
      VSPHERE_FILE_TASK_TIMEOUT_MS: z.coerce.number().int().positive().optional(),

      // Fallbacks for request params, same names the VMware tooling has always read.
      VMWARE_HOST: z.string().min(1).optional(),
      VMWARE_USER: z.string().min(1).optional(),
      VMWARE_PASSWORD: z.string().min(1).optional(),
      VMWARE_PORT: z.coerce.number().int().min(1).max(65535).optional(),
      VMWARE_VALIDATE_CERTS: booleanFlag.optional(),
    },
    runtimeEnv: source,
    emptyStringAsUndefined: true,
  });
}

export type RuntimeEnv = ReturnType<typeof loadRuntimeEnv>;
