export {
  ConnectionHandler,
  type ConnectionOptions,
  type ConnectionState,
  type ConnectionStats,
  type ErrorReplyPolicy,
  type ReadPaddingPolicy,
  type ResyncPolicy,
} from "./connection-handler.ts";
export { dispatchCommand } from "./dispatch.ts";
export {
  type ByteSink,
  type ByteStreamOptions,
  byteStreamFromSocket,
  socketSink,
} from "./stream.ts";
