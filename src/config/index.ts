export * from './app.config';
export * from './database.config';
export * from './matching.config';
export * from './throttle.config';
