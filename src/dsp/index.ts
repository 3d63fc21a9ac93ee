export {
  bytesToValue,
  formatLabel,
  fromRaw,
  MEASUREMENT_UNITS,
  type MeasurementUnit,
  NUMBER_FORMATS,
  type NumberFormat,
  toRaw,
  unitLabel,
  valueToBytes,
  WORD_SIZE,
} from "./formats.ts";
export {
  DEFAULT_POLL_INTERVAL,
  RegisterPoller,
  type RegisterPollerEvents,
  type RegisterPollerOptions,
  type WriteValueError,
} from "./poller.ts";
export {
  decodeRegister,
  defaultRegisterMap,
  encodeRegister,
  findRegister,
  loadRegisterMap,
  parseRegisterMap,
  type RegisterDefinition,
} from "./registers.ts";
