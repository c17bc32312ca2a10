export * from './types';
export { create, skipAll } from './pipeline';
export type { PipelineInstance, PipelineOptions } from './pipeline';
export { plan, artifactNameFor, currentText, effectiveSettings, isEnabled, instructionFor, STAGE_ORDER } from './stages';
export { artifactPath, createWriter } from './artifacts';
export type { ArtifactWriter } from './artifacts';
