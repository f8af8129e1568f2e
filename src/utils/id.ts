import { nanoid } from 'nanoid';

/** Id for an inbound work item */
export function generateWorkItemId(): string {
  return nanoid(12);
}

/** Short id for a single reservation on a worker */
export function generateLeaseId(): string {
  return nanoid(8);
}
