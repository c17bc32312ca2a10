export * from './types';
export { create, getProvider, buildPrompt, hasCredentials, RefinementError } from './client';
