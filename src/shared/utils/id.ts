import { v4 as uuidv4 } from "uuid";

/** Random request identifier (UUIDv4). */
export const generateId = (): string => uuidv4();
