export * from './random';
export * from './geometry';
export * from './platform';
export * from './actor';
export * from './resolver';
export * from './generator';
export * from './camera';
export * from './progress';
export * from './world';
