export const FLASH_TTL_MS = 3_000;

export interface FlashMessage {
  text: string;
  createdAt: number;
}

export const isFlashExpired = (flash: FlashMessage, now: number, ttlMs = FLASH_TTL_MS): boolean =>
  now - flash.createdAt >= ttlMs;
