/**
 * UUID Utility
 * Time-ordered UUID v7 for sessions, turns and wire events
 */

import { v7 as uuidv7 } from 'uuid';

export function generateId(): string {
  return uuidv7();
}
