export * from './plug';
export * from './plug-group';
