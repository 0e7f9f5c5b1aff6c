export { RateLimiterService } from './rate-limiter.service';
