export { GoogleVisionEngine, fetchPost } from './google-vision-engine.js';
export type { GoogleVisionEngineConfig, HttpPostFn } from './google-vision-engine.js';
export { OcrAuthenticationError } from './exceptions.js';
