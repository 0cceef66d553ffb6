// This module centralizes service identity values so logs and the HTTP surface stay in sync.

export const SERVICE_NAME = 'station-export-bot';
export const SERVICE_VERSION = '0.3.0';
