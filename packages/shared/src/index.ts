// Domain types, constants and validators shared by the monitor and its tests
export * from './constants';
export * from './types';
export * from './validators';
export * from './utils/formatBytes';
