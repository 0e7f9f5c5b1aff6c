export { SessionStoreService } from './session-store.service';
export type { ExpiryListener } from './session-store.service';
