export * from './tags';
export * from './snippet';
