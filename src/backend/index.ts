// Backend module exports and registration

import { BackendRegistry } from "./backend.ts";
import { HttpBridgeBackend } from "./http-bridge-backend.ts";
import { openI2cBus } from "./i2c-bus.ts";
import { MockBackend } from "./mock-backend.ts";
import { RegisterBusBackend } from "./register-bus-backend.ts";

BackendRegistry.register(
  "bus",
  (config, { logger }) =>
    new RegisterBusBackend(config, {
      logger,
      openBus: () => openI2cBus(config.busNumber),
    }),
);

BackendRegistry.register(
  "http",
  (config, { logger }) => new HttpBridgeBackend(config, { logger }),
);

BackendRegistry.register(
  "mock",
  (config, { logger }) => new MockBackend(config, { logger }),
);

export type {
  Backend,
  BackendConfig,
  BackendFactory,
  BackendFactoryContext,
  BackendType,
  BusBackendConfig,
  HttpBackendConfig,
  MockBackendConfig,
} from "./backend.ts";
export { BackendRegistry, validateAccess } from "./backend.ts";
export {
  HttpBridgeBackend,
  type HttpBridgeBackendOptions,
} from "./http-bridge-backend.ts";
export { openI2cBus } from "./i2c-bus.ts";
export {
  DEFAULT_MOCK_FILL,
  MockBackend,
  type MockBackendOptions,
  type RecordedWrite,
} from "./mock-backend.ts";
export {
  type RegisterBus,
  RegisterBusBackend,
  type RegisterBusBackendOptions,
} from "./register-bus-backend.ts";
