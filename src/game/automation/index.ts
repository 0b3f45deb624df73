export * from './decisionProviders';
export * from './runner';
export * from './headless';
