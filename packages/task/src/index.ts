export {
  ChannelClosedError,
  createChannel,
  MemoryChannel,
} from "./adapters/memory/memory-channel"
export { run } from "./core/run"
export { chan, chan2, chan3, chan4, chan5, chan6 } from "./core/select"
export { tick } from "./core/tick"
export type { ReceiveChannel, ReceiveResult, SendChannel } from "./ports/channel"
export type {
  ChanOptions,
  Handler,
  TaskFn,
  TaskHandle,
  TaskOptions,
  Ticker,
} from "./ports/task"
