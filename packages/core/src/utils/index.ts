export { emptyResult, errorMessage } from './result.js';
