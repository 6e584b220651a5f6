export { FrankfurterAdapter } from './frankfurter.adapter';
