/** Largest delay a Node timer accepts; longer delays fire after 1ms */
export const MAX_TIMER_MS = 2_147_483_647;
