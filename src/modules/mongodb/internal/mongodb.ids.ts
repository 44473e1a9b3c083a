import { ObjectId } from 'mongodb';

const HEX24 = /^[0-9a-fA-F]{24}$/;

export function isHex24(value: string): boolean {
  return HEX24.test(value);
}

/** ObjectId for a 24-hex id string; null for anything else. */
export function toObjectId(id: string): ObjectId | null {
  return isHex24(id) ? new ObjectId(id) : null;
}
