export { generateRequestId } from './generateRequestId.js';
