export { classifySynthesisError, getRetryDelay } from './error-classifier';
export { collectAudio } from './audio-payload';
