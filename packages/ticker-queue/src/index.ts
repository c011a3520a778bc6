export { createMessageQueue, DEFAULT_PRIORITY } from "./message-queue.js";
export type { MessageItem, MessageQueue, MessageQueueOptions } from "./message-queue.js";
