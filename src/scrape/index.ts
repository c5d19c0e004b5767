export { scrapeSingle } from './single.js';
export { batch, scrapeBatch, validateBatchUrls } from './batch.js';
