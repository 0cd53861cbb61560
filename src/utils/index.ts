/**
 * Utilities Module
 */

export { cidrsOverlap, isValidCidr, isValidDomain, type ParsedCidr, parseCidr } from './network.js';
export { arrayField, fieldAt, isRecord, numberField, stringField } from './type-guards.js';
