/**
 * Transport layer exports.
 */

export type { Backend } from './Backend.ts';

export { WsBackend } from './WsBackend.ts';
export type { WsBackendOptions } from './WsBackend.ts';
