export { createSessionStore } from './session-store';
export type { SessionStore, SessionDependencies, StartOptions } from './session-store';

export { computePhase, displayPath, formatStatus } from './phase-machine';
export type { CullingPhase } from './phase-machine';
