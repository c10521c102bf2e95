export { buildFoundContext, buildNotFoundContext, summarizeLineItems } from './format';
