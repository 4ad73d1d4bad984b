/**
 * Cost reports in FOCUS format.
 *
 * Generation is asynchronous: generateCostReport answers with a task whose
 * response carries the report id, which downloadCostReport then fetches.
 */

import type { CloudClient } from "../client.js";
import type { JsonValue } from "../core/types.js";
import { CloudError } from "../core/errors.js";
import { segment, type Tag, type TaskStateUpdate } from "./common.js";

export type CostReportFormat = "csv" | "json";

export type SubscriptionType = "pro" | "essentials";

export interface CostReportCreateRequest {
  /** YYYY-MM-DD */
  startDate: string;
  /** YYYY-MM-DD */
  endDate: string;
  format?: CostReportFormat;
  subscriptionIds?: number[];
  databaseIds?: number[];
  subscriptionType?: SubscriptionType;
  regions?: string[];
  tags?: Array<Pick<Tag, "key" | "value">>;
}

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

export class CostReportRequestBuilder {
  private request: Partial<CostReportCreateRequest> = {};

  startDate(date: string): this {
    this.request.startDate = date;
    return this;
  }

  endDate(date: string): this {
    this.request.endDate = date;
    return this;
  }

  format(format: CostReportFormat): this {
    this.request.format = format;
    return this;
  }

  subscriptionIds(ids: number[]): this {
    this.request.subscriptionIds = [...ids];
    return this;
  }

  databaseIds(ids: number[]): this {
    this.request.databaseIds = [...ids];
    return this;
  }

  subscriptionType(type: SubscriptionType): this {
    this.request.subscriptionType = type;
    return this;
  }

  regions(regions: string[]): this {
    this.request.regions = [...regions];
    return this;
  }

  tags(tags: Array<Pick<Tag, "key" | "value">>): this {
    this.request.tags = tags.map(({ key, value }) => ({ key, value }));
    return this;
  }

  /** Appends one tag filter. */
  tag(key: string, value: string): this {
    this.request.tags = [...(this.request.tags ?? []), { key, value }];
    return this;
  }

  build(): CostReportCreateRequest {
    const { startDate, endDate, ...rest } = this.request;
    if (startDate === undefined) {
      throw CloudError.configuration("Cost report start date is required");
    }
    if (endDate === undefined) {
      throw CloudError.configuration("Cost report end date is required");
    }
    if (!ISO_DATE.test(startDate) || !ISO_DATE.test(endDate)) {
      throw CloudError.configuration("Cost report dates must be formatted YYYY-MM-DD");
    }
    // Lexicographic order matches date order for YYYY-MM-DD
    if (startDate > endDate) {
      throw CloudError.configuration(
        `Cost report start date ${startDate} is after end date ${endDate}`
      );
    }
    return { startDate, endDate, ...rest };
  }
}

export class CostReportHandler {
  constructor(private readonly client: CloudClient) {}

  static requestBuilder(): CostReportRequestBuilder {
    return new CostReportRequestBuilder();
  }

  generateCostReport(request: CostReportCreateRequest): Promise<TaskStateUpdate> {
    return this.client.post<TaskStateUpdate>("/cost-report", request);
  }

  generateCostReportRaw(body: JsonValue): Promise<JsonValue> {
    return this.client.postRaw("/cost-report", body);
  }

  /** Report contents as produced by the API, CSV or JSON bytes. */
  downloadCostReport(costReportId: string): Promise<Uint8Array> {
    return this.client.getBytes(`/cost-report/${segment(costReportId)}`);
  }
}
