export default class NotFoundError extends Error {
  entity: string;
  reference: string;

  constructor(entity: string, reference: string | number) {
    super(`${entity} ${reference} is no longer in the directory`);
    this.name = 'NotFoundError';
    this.entity = entity;
    this.reference = String(reference);
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, NotFoundError);
    }
  }
}
