export { ConsoleTransport, type ConsoleTransportOptions } from "./console";
export { MemoryTransport } from "./memory";
