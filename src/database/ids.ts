import { v4 as uuidv4 } from 'uuid';

/** 32-char lowercase hex id (a v4 uuid without dashes). */
export function newEntityId(): string {
  return uuidv4().replace(/-/g, '');
}
