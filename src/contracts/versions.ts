export const ENGINE_VERSION = '1.0.0' as const;
export const CONTRACT_VERSION = 'tolerance-output.v1' as const;
