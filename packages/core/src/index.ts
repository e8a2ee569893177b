/**
 * @zipmap/core: configuration, logging and runtime safety shared by the
 * zipmap packages.
 *
 * @packageDocumentation
 */

export { config, defineConfig, ConfigError } from "./config.js";
export type { ZipmapConfig, BindingConfig, BindingMode, ErrorsConfig } from "./config.js";

export { createLogger } from "./logger.js";
export type { Logger } from "./logger.js";

export { invariant, unreachable } from "./safety.js";
