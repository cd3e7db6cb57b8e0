import { v4 as uuidv4, validate as uuidValidate } from 'uuid';

export function newSegmentId(): string {
  return uuidv4();
}

export function isSegmentId(value: string): boolean {
  return uuidValidate(value);
}
