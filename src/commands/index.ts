export * from './base-command';
export * from './configure';
export * from './list-resources';
export * from './validate-config';
