/**
 * Largest delay a Node.js timer honours. Longer delays fire after about 1 ms.
 */
export const MAX_TIMER_DELAY_MS = 2147483647;
