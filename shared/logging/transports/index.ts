export { ConsoleTransport, formatConsoleLine, type ConsoleTransportOptions } from "./console.js";
export { FileTransport, type FileTransportOptions } from "./file.js";
export { MemoryTransport } from "./memory.js";
