import { Severity, isSeverity } from './Diagnostics';

export interface ParserConfig {
  /** Bytes read from the file per chunk. */
  chunkSize: number;
  /** Lowest severity the console sink prints. */
  logLevel: Severity;
  /** Print per-element reduction timings after each parse. */
  profile: boolean;
}

export const DEFAULT_CONFIG: Readonly<ParserConfig> = {
  chunkSize: 1024,
  logLevel: 'warning',
  profile: false
};

/**
 * Read the parser settings from the environment:
 * FMIMD_CHUNK_SIZE, FMIMD_LOG_LEVEL and FMIMD_PROFILE=1.
 * Unusable values fall back to the defaults.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ParserConfig {
  const config: ParserConfig = { ...DEFAULT_CONFIG };

  const chunkSize = (env.FMIMD_CHUNK_SIZE || '').trim();
  if (/^\d+$/.test(chunkSize) && parseInt(chunkSize, 10) > 0) {
    config.chunkSize = parseInt(chunkSize, 10);
  }

  const logLevel = (env.FMIMD_LOG_LEVEL || '').trim();
  if (isSeverity(logLevel)) {
    config.logLevel = logLevel;
  }

  config.profile = ((env.FMIMD_PROFILE || '').trim() === '1');
  return config;
}
