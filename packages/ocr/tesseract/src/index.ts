export { TesseractEngine } from './tesseract-engine.js';
export type { TesseractEngineConfig } from './tesseract-engine.js';
