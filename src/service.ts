import type { RunnableConfig } from "@langchain/core/runnables";
import type { RoutingState } from "./agents/types.js";
import type { DepartmentName } from "./departments/types.js";
import type { DepartmentPipeline } from "./pipeline.js";

export interface QueryResponse {
  query: string;
  departments_routed: DepartmentName[];
  answer: string;
}

export interface RouteResponse {
  query: string;
  departments_routed: DepartmentName[];
  routing: RoutingState;
}

/** What HTTP and the terminal loop call. Adds tracing callbacks to every request. */
export class QueryService {
  constructor(
    private readonly pipeline: Pick<DepartmentPipeline, "run" | "routeOnly">,
    private readonly baseConfig: RunnableConfig = {}
  ) {}

  async answer(query: string, signal?: AbortSignal): Promise<QueryResponse> {
    const result = await this.pipeline.run(query, this.requestConfig("query", signal));
    return {
      query: result.query,
      departments_routed: result.departments,
      answer: result.answer
    };
  }

  async route(query: string, signal?: AbortSignal): Promise<RouteResponse> {
    const decision = await this.pipeline.routeOnly(query, this.requestConfig("route", signal));
    return {
      query: query.trim(),
      departments_routed: decision.departments,
      routing: decision.state
    };
  }

  private requestConfig(operation: string, signal?: AbortSignal): RunnableConfig {
    return {
      ...this.baseConfig,
      metadata: { ...this.baseConfig.metadata, operation },
      ...(signal ? { signal } : {})
    };
  }
}
