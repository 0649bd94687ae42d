export { requestUnlockedLink } from "./client";
export type { UnlockResult } from "./client";
export { createUnlockHelper, UNLOCK_MESSAGES } from "./helper";
export type { UnlockHelper, UnlockHelperOptions } from "./helper";
