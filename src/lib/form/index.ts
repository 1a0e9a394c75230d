export * from './field.types';
export * from './layout.types';
