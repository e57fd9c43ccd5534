import { ObjectId } from "mongodb";

/**
 * Converts a string or ObjectId to an ObjectId instance
 * @returns ObjectId instance or null if the value is not a valid id
 */
export function toObjectId(id: string | ObjectId): ObjectId | null {
  if (id instanceof ObjectId) return id;

  // ObjectId.isValid also accepts any 12-character string
  if (typeof id === "string" && /^[0-9a-fA-F]{24}$/.test(id)) {
    return new ObjectId(id);
  }

  return null;
}
