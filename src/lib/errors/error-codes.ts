export const ErrorCode = {
  VSPHERE_FILE_CONFIG_INVALID: 'VSPHERE_FILE_CONFIG_INVALID',
  VSPHERE_FILE_NETWORK_ERROR: 'VSPHERE_FILE_NETWORK_ERROR',
  VSPHERE_FILE_PROBE_FAILED: 'VSPHERE_FILE_PROBE_FAILED',
  VSPHERE_FILE_NOT_FOUND: 'VSPHERE_FILE_NOT_FOUND',
  VSPHERE_FILE_MUTATION_FAILED: 'VSPHERE_FILE_MUTATION_FAILED',
  VSPHERE_FILE_MALFORMED_RESPONSE: 'VSPHERE_FILE_MALFORMED_RESPONSE',
  VSPHERE_FILE_INTERNAL_ERROR: 'VSPHERE_FILE_INTERNAL_ERROR',
} as const;

export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];
