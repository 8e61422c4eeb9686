/**
 * @fifo-verify/fifo-model
 *
 * In-process behavioural model of a dual-clock FIFO, exposing the pin
 * contract the harness drives.
 */

export { createAsyncFifo } from "./async-fifo.js";
export type { AsyncFifoDevice, AsyncFifoOptions, AsyncFifoState } from "./async-fifo.js";
export { binToGray, grayToBin } from "./gray.js";
