import type { CallResult } from '../bridge/protocol.js';

/** The part of `BridgeClient` the tool handlers depend on. */
export interface BridgeCaller {
  readonly endpoint: string;
  call(
    module: string,
    fn: string,
    args?: Record<string, unknown>,
  ): Promise<CallResult>;
}

export interface ServerContext {
  logDebug: (message: string) => void;
  getBridgeClient: () => BridgeCaller;
}
