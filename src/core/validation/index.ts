export { PreflightValidator } from './preflight.js';
