export { yieldToEventLoop, untilAborted } from './async';
