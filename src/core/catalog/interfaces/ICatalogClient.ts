/**
 * Catalog Client Interface
 *
 * The remote registry only offers full snapshots: a paginated listing of
 * type names and one schema per name. There is no version or delta API.
 */

import type {
  DescribeTypeCommandInput,
  DescribeTypeCommandOutput,
  ListTypesCommandInput,
  ListTypesCommandOutput,
} from "@aws-sdk/client-cloudformation";
import type { RawProviderMetadata } from "../../ledger/models/version-record.js";

export interface CatalogEntry {
  id: string;
  metadata?: RawProviderMetadata;
}

export interface FetchedEntity {
  /** Parsed schema document */
  document: unknown;
  metadata?: RawProviderMetadata;
}

export interface ICatalogClient {
  /**
   * Every entity currently in the catalog. Lazy; pages are requested as the
   * iterator is consumed.
   */
  listEntities(): AsyncIterable<CatalogEntry>;

  fetchEntity(entityId: string): Promise<FetchedEntity>;
}

// =============================================================================
// CloudFormation
// =============================================================================

/**
 * The two registry calls the CloudFormation adapter needs
 */
export interface CloudFormationApi {
  listTypes(
    input: ListTypesCommandInput
  ): Promise<Pick<ListTypesCommandOutput, "TypeSummaries" | "NextToken">>;

  describeType(
    input: DescribeTypeCommandInput
  ): Promise<Pick<DescribeTypeCommandOutput, "Schema" | "TimeCreated" | "DeprecatedStatus">>;
}

export interface CloudFormationCatalogConfig {
  /** Only type names starting with this prefix are listed */
  typePrefix: string;
  /** Page size hint for ListTypes */
  pageSize: number;
}

export const DEFAULT_CLOUDFORMATION_CATALOG_CONFIG: CloudFormationCatalogConfig = {
  typePrefix: "AWS::",
  pageSize: 100,
};
