/**
 * Image classification entry point
 */
export { ImageClassifier, createImageClassifier } from './classifier.js';
export { PLACEHOLDER_MARKERS, hasPlaceholderMarker, isPlaceholderUrl } from './heuristics.js';
export { headProbe, interpretHeadResponse, closeProbeAgents } from './probe.js';
export * from './types.js';
