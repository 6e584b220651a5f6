export { FetchException } from './fetch.exception';
