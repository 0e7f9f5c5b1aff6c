export { isLikelyNoise } from './transcript-filter';
