export * from './config';
export * from './env';
export { type LoadedConfig, type LoadOptions, loadConfig, loadConfigFile, parseEnvContent } from './loader';
