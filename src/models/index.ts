export * from './blob';
export * from './catalog';
export * from './errors';
export * from './headers';
export * from './manifest';
export * from './tags';
export { isRecord } from './parse';
