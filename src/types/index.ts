export * from './menu';
export * from './order';
