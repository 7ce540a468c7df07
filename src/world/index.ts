export * from './constants';
export * from './coords';
export * from './chunk-store';
