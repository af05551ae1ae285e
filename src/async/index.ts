export { createOperationQueue, type OperationQueue } from "./operation-queue";
export { sleep } from "./sleep";
