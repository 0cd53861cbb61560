export { ResourceRegistry } from './resource-registry.js';
