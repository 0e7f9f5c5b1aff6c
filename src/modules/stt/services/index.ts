export { DeepgramTranscriber } from './stt.service';
