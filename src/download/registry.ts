import type { ProcessRunner } from "../execution/backends/types.js";
import type { EnaPortalClient } from "../metadata/enaPortal.js";
import type { SraLocator } from "../metadata/sraLocator.js";
import { AwsCpAdapter, AwsHttpAdapter, GcpCpAdapter, PrefetchAdapter } from "./adapters/container.js";
import { EnaAscpAdapter, EnaFtpAdapter } from "./adapters/ena.js";
import type { AdapterRegistry } from "./types.js";

export function createAdapterRegistry(deps: {
  runner: ProcessRunner;
  ena: EnaPortalClient;
  locator: SraLocator;
  awsOpenDataBaseUrl: string;
}): AdapterRegistry {
  return {
    "ena-ascp": new EnaAscpAdapter(deps.runner, deps.ena),
    "ena-ftp": new EnaFtpAdapter(deps.runner, deps.ena),
    prefetch: new PrefetchAdapter(deps.runner),
    "aws-http": new AwsHttpAdapter(deps.runner, deps.awsOpenDataBaseUrl),
    "aws-cp": new AwsCpAdapter(deps.runner, deps.locator),
    "gcp-cp": new GcpCpAdapter(deps.runner, deps.locator)
  };
}
