/**
 * CloudFormation registry catalog
 *
 * Lists public resource types with ListTypes and fetches each schema with
 * DescribeType. The schema arrives as a JSON string and is parsed here.
 */

import {
  CloudFormationClient,
  DescribeTypeCommand,
  ListTypesCommand,
  type DescribeTypeCommandInput,
  type ListTypesCommandInput,
} from "@aws-sdk/client-cloudformation";
import {
  DEFAULT_CLOUDFORMATION_CATALOG_CONFIG,
  type CatalogEntry,
  type CloudFormationApi,
  type CloudFormationCatalogConfig,
  type FetchedEntity,
  type ICatalogClient,
} from "../interfaces/ICatalogClient.js";
import { createLogger } from "../../../utils/logger.js";

const logger = createLogger("cloudformation-catalog");

/**
 * {@link CloudFormationApi} backed by the AWS SDK client
 */
export class SdkCloudFormationApi implements CloudFormationApi {
  constructor(private readonly client: CloudFormationClient) {}

  listTypes(input: ListTypesCommandInput) {
    return this.client.send(new ListTypesCommand(input));
  }

  describeType(input: DescribeTypeCommandInput) {
    return this.client.send(new DescribeTypeCommand(input));
  }
}

export class CloudFormationCatalogClient implements ICatalogClient {
  private readonly config: CloudFormationCatalogConfig;

  constructor(
    private readonly api: CloudFormationApi,
    config: Partial<CloudFormationCatalogConfig> = {}
  ) {
    this.config = { ...DEFAULT_CLOUDFORMATION_CATALOG_CONFIG, ...config };
  }

  async *listEntities(): AsyncIterable<CatalogEntry> {
    let nextToken: string | undefined;
    let page = 0;
    do {
      const response = await this.api.listTypes({
        Visibility: "PUBLIC",
        Type: "RESOURCE",
        MaxResults: this.config.pageSize,
        NextToken: nextToken,
      });
      page++;

      for (const summary of response.TypeSummaries ?? []) {
        const typeName = summary.TypeName;
        if (typeName && typeName.startsWith(this.config.typePrefix)) {
          yield { id: typeName };
        }
      }

      nextToken = response.NextToken || undefined;
      logger.debug({ page, hasMore: nextToken !== undefined }, "Listed registry page");
    } while (nextToken !== undefined);
  }

  async fetchEntity(entityId: string): Promise<FetchedEntity> {
    const response = await this.api.describeType({ Type: "RESOURCE", TypeName: entityId });

    if (!response.Schema) {
      throw new Error(`Registry returned no schema for ${entityId}`);
    }

    let document: unknown;
    try {
      document = JSON.parse(response.Schema);
    } catch (error) {
      throw new Error(`Registry returned an invalid schema for ${entityId}`, { cause: error });
    }

    return {
      document,
      metadata: {
        timeCreated: response.TimeCreated,
        deprecatedStatus: response.DeprecatedStatus,
      },
    };
  }
}
