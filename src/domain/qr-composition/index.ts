export * from './contracts/composition-step.js';
export * from './contracts/workspace.js';
export * from './entities/compose-job.js';
export * from './value-objects/composition-options.js';
export * from './value-objects/normalized-media.js';
