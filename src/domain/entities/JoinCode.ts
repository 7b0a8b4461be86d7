import type { RoomCode } from "../typedefs.js";

export const JOIN_CODE_ALPHABET = "ABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789";
export const JOIN_CODE_LENGTH = 6;

export function generateJoinCode(random: () => number = Math.random): RoomCode {
  let code = "";
  while (code.length < JOIN_CODE_LENGTH) {
    const index = Math.min(
      Math.floor(random() * JOIN_CODE_ALPHABET.length),
      JOIN_CODE_ALPHABET.length - 1,
    );
    code += JOIN_CODE_ALPHABET.charAt(index);
  }
  return code;
}

/** Draws codes until one is not taken. */
export function generateUniqueJoinCode(
  isTaken: (code: RoomCode) => boolean,
  random: () => number = Math.random,
): RoomCode {
  let code = generateJoinCode(random);
  while (isTaken(code)) code = generateJoinCode(random);
  return code;
}

export function normalizeJoinCode(code: string): RoomCode {
  return code.trim().toUpperCase();
}
