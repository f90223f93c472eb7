import type { GameLogEntry } from '../types.js';
import { EventBus } from './eventBus.js';

export { EventBus, type Unsubscribe } from './eventBus.js';

/**
 * Every stamped log entry of the running game, in emission order.
 * Only the logger emits here; observers (console, files, tests) subscribe.
 */
export const eventBus = new EventBus<GameLogEntry>();
