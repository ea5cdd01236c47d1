/**
 * Catalog Module
 *
 * Port to the remote schema registry and its CloudFormation adapter.
 *
 * @module
 */

export * from "./interfaces/ICatalogClient.js";
export { CloudFormationCatalogClient, SdkCloudFormationApi } from "./impl/CloudFormationCatalogClient.js";

import { CloudFormationClient } from "@aws-sdk/client-cloudformation";
import type { CloudFormationCatalogConfig, ICatalogClient } from "./interfaces/ICatalogClient.js";
import { CloudFormationCatalogClient, SdkCloudFormationApi } from "./impl/CloudFormationCatalogClient.js";

/**
 * Create a catalog client for the public CloudFormation registry
 *
 * Credentials and, when `region` is absent, the region come from the SDK
 * default provider chain.
 */
export function createCloudFormationCatalog(
  options: { region?: string } & Partial<CloudFormationCatalogConfig> = {}
): ICatalogClient {
  const { region, ...config } = options;
  const client = new CloudFormationClient(region ? { region } : {});
  return new CloudFormationCatalogClient(new SdkCloudFormationApi(client), config);
}
