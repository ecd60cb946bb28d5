/**
 * Core package centralizes shared contracts and configuration helpers.
 * Everything else in the workspace depends on these primitives.
 */
export * from "./types";
export * from "./errors";
export * from "./config";
export { loadEnvFiles } from "./env";
export {
	configureLogger,
	createLogger,
	log,
	type BaseLogPayload,
	type LogLevel,
	type ModuleLogger,
} from "./utils/logger";
