// Adapters barrel export
export * from './recipes/cocktaildb';
