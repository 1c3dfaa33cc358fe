import type { Logger } from "pino";
import type { ClockPort } from "../../core/ports/outboundPorts";
import type { HttpJsonClient } from "../http/httpJsonClient";
import type { CachedRecordReader } from "./cachedRecordReader";

/**
 * Collaborators shared by every provider handler a registry creates.
 */
export type ProviderDependencies = {
  reader: CachedRecordReader;
  httpClient: HttpJsonClient;
  clock: ClockPort;
  log: Logger;
  httpRetries: number;
};
