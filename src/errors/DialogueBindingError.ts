// The dialogue cannot be tied to its user or shift row anymore.
export default class DialogueBindingError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DialogueBindingError';
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, DialogueBindingError);
    }
  }
}
