export {
  createHttpApi,
  type HttpApiOptions,
  type HttpServerHandle,
  parseNumberParam,
  startHttpServer,
} from "./http-api.ts";
export { BridgeTcpServer, type TcpServerOptions } from "./tcp-server.ts";
