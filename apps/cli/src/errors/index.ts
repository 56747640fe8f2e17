export { ConfigError } from './config-error';
