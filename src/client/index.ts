export {
  BridgeClient,
  type ClientError,
  type ClientTransport,
  connectTcp,
  type WriteOptions,
} from "./bridge-client.ts";
export { responseFrameStream } from "./response-stream.ts";
