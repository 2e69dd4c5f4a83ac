export * from './constants';
export * from './attributes';
export * from './message';
export * from './stream-io';
export * from './codec';
