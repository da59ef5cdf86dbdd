export * from './errors';
export * from './physics';
export * from './platforms';
export * from './generator';
export * from './progression';
export * from './settings';
