export * from './transport';
export * from './memory-transport';
export * from './ws-transport';
