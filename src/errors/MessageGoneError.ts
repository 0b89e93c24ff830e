export default class MessageGoneError extends Error {
  messageId: number;

  constructor(messageId: number, message = `Message ${messageId} no longer exists`) {
    super(message);
    this.name = 'MessageGoneError';
    this.messageId = messageId;
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, MessageGoneError);
    }
  }
}
