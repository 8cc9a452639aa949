export { StreamableHttpTransport, type StreamableHttpTransportOptions } from "./transport";
export { isLoopbackHost } from "./loopback";
export { renderContent } from "./content";
