/**
 * @fileoverview Infrastructure Config Module Exports
 *
 * @packageDocumentation
 * @module @weavearc/core/infrastructure/config
 * @license Apache-2.0
 */

export {
  type WeavearcConfig,
  type ConfigOverrides,
  EnvSchema,
  ConfigSchema,
  CONFIG_TOKEN,
  loadConfig,
} from './config';

export { ConfigurationError } from './configuration.error';
