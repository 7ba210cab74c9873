/**
 * Public configuration exports.
 *
 * @remarks
 * Other layers import run configuration from this path rather than reaching
 * into the resolver directly.
 */

export {
  type ConfigSources,
  DEFAULT_ENDPOINT,
  DEFAULT_HOME_DIRECTORY,
  ENV_KEYS,
  type LintConfig,
  readProgramId,
  resolveLintConfig,
} from './config.ts';
