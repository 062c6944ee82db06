import { toPublicError } from '@/lib/errors/error';
import { silentLogger } from '@/lib/logging/logger';

import { MutationError, NotFoundError, ProbeError, VsphereFileError, extractErrno, extractMessage } from './errors';
import { buildBaseUrl, buildDatastoreSpec, buildFolderPath } from './paths';

import type { Logger } from '@/lib/logging/logger';
import type { FolderClient } from './folder-client';
import type { FileManagerClient } from './soap';
import type {
  ProbeResult,
  ReconcileFailure,
  ReconcileOutcome,
  ReconcileResult,
  ReconcileSuccess,
  VsphereFileParams,
} from './types';

export type ReconcileDeps = {
  folder: FolderClient;
  fileManager: Pick<FileManagerClient, 'deleteFile' | 'makeDirectory'>;
  logger?: Logger;
};

export function buildTargetUrl(params: Pick<VsphereFileParams, 'host' | 'port' | 'datastore' | 'datacenter' | 'path'>) {
  return `${buildBaseUrl(params.host, params.port)}${buildFolderPath(params)}`;
}

function toFailure(err: unknown, result: ReconcileResult): ReconcileFailure {
  if (err instanceof VsphereFileError) {
    return {
      ...result,
      reason: result.reason ?? err.reason,
      msg: err.message,
      errno: err.errno,
      ...(err.headers ? { headers: err.headers } : {}),
      error: err.toAppError(),
    };
  }

  const message = extractMessage(err);
  return { ...result, reason: result.reason ?? message, msg: message, errno: extractErrno(err), error: toPublicError(err) };
}

/** Returns whether the path exists; records what the probe learned on `result`. */
function applyProbe(probe: ProbeResult, result: ReconcileResult): boolean {
  switch (probe.kind) {
    case 'found':
      result.size = probe.size;
      return true;
    case 'not_found':
      return false;
    case 'error':
      result.status = probe.status;
      result.reason = probe.reason;
      throw new ProbeError(`Failed to query for file '${result.path}'`, {
        status: probe.status,
        reason: probe.reason,
        headers: probe.headers,
      });
    default: {
      const unreachable: never = probe;
      throw new Error(`unexpected probe result: ${JSON.stringify(unreachable)}`);
    }
  }
}

export async function reconcileDatastorePath(input: {
  params: VsphereFileParams;
  checkMode: boolean;
  deps: ReconcileDeps;
}): Promise<ReconcileOutcome> {
  const { params, checkMode, deps } = input;
  const logger = deps.logger ?? silentLogger;

  const url = buildTargetUrl(params);
  const spec = buildDatastoreSpec(params);
  const result: ReconcileResult = {
    path: params.path,
    size: null,
    state: params.state,
    status: null,
    url,
    reason: null,
  };

  const done = (changed: boolean): ReconcileOutcome => {
    const success: ReconcileSuccess = { ...result, changed };
    logger.info({ event_type: 'vsphere_file.done', changed, state: success.state, status: success.status });
    return { ok: true, result: success };
  };

  try {
    const probe = await deps.folder.probe(url);
    logger.info({ event_type: 'vsphere_file.probe', url, status: probe.status, outcome: probe.kind });
    const exists = applyProbe(probe, result);

    switch (params.state) {
      case 'absent': {
        if (!exists) return done(false);
        logger.info({ event_type: 'vsphere_file.action', action: 'delete', spec, check_mode: checkMode });
        if (!checkMode) await deps.fileManager.deleteFile(spec);
        return done(true);
      }

      case 'directory': {
        if (exists) return done(false);
        logger.info({ event_type: 'vsphere_file.action', action: 'mkdir', spec, check_mode: checkMode });
        if (!checkMode) await deps.fileManager.makeDirectory(spec, true);
        return done(true);
      }

      case 'file': {
        result.status = probe.status;
        if (!exists) {
          result.state = 'absent';
          throw new NotFoundError(`File '${params.path}' is absent, cannot continue`, { status: probe.status });
        }
        return done(false);
      }

      case 'touch': {
        if (exists) {
          result.state = 'file';
          return done(false);
        }

        logger.info({ event_type: 'vsphere_file.action', action: 'touch', url, check_mode: checkMode });
        if (checkMode) {
          result.reason = 'Created';
          result.status = 201;
        } else {
          try {
            const res = await deps.folder.touch(url);
            result.reason = res.reason;
            result.status = res.status;
          } catch (err) {
            if (!(err instanceof MutationError)) throw err;
            result.reason = err.reason;
            result.status = err.status;
            throw new MutationError(`Failed to touch '${params.path}'`, {
              status: err.status,
              reason: err.reason,
              ...(err.headers ? { headers: err.headers } : {}),
              cause: err,
            });
          }
        }

        result.size = 0;
        result.state = 'file';
        return done(true);
      }
    }
  } catch (err) {
    const failure = toFailure(err, result);
    logger.error({
      event_type: 'vsphere_file.failed',
      code: failure.error.code,
      msg: failure.msg,
      status: failure.status,
      errno: failure.errno,
    });
    return { ok: false, failure };
  }
}
