export * from './chat-log';
export * from './game-client';
