export { ConfigException } from './config.exception';
