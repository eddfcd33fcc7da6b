export { PoolConfiguration } from './poolConfiguration.js';
