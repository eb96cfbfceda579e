export * from './itemStateMachine.js';
export * from './runSummary.js';
