/**
 * Remote task relay
 *
 * Public API for embedding the relay server, the executor and the
 * coordinator client.
 */

export * from './errors';
export * from './config';
export * from './logging';
export * from './queue';
export * from './executor';
export * from './coordinator';
export * from './web';
