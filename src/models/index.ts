// Export all models
export * from './Message';
export * from './Filter';
export * from './Classification';
export * from './ports';
