import { randomInt } from "node:crypto";

const ALPHANUMERIC = "abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789";

/**
 * Generate a random string of the given size, e.g. for temporary remote file names
 */
export function idGenerator(size = 6, chars = ALPHANUMERIC): string {
  let id = "";
  for (let i = 0; i < size; i += 1) {
    id += chars[randomInt(chars.length)];
  }
  return id;
}
