export { BucketsService } from './service.js';
