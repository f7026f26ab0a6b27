export { parseArrayRepresentation } from './ReprParser';
