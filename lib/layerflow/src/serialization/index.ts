export * from './record-parser';
export * from './serializer';
export * from './default-registry';
