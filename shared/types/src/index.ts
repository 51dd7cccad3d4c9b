// Shared types for the MEV analyzer

export * from './domain';
export * from './errors';
export * from './ports';
