export { QUEUE_NAMES, createQueues, closeQueues, embedJobId } from "./queues.js";
export type { QueueConfig, QueueName, Queues } from "./queues.js";
export { DLQ_NAME, createDeadLetterQueue, isFinalAttempt } from "./dlq.js";
export type { DeadLetterJobData, DeadLetterQueue } from "./dlq.js";
export { parseRedisConnection } from "./connection.js";
