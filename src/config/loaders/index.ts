import { configLoader } from './config.loader';
import { Config } from '../types';

export { configLoader } from './config.loader';

export function loader(): Config {
  return configLoader(process.env);
}
