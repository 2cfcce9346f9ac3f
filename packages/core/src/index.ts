export * from './models';
export * from './text';
export * from './content';
