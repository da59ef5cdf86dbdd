export * from './PlatformGenerator';
export * from './pool';
export * from './reachability';
export * from './selection';
