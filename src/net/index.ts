export * from './connection';
export * from './session';
export * from './receiver';
