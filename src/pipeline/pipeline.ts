/**
 * Ordered chain of policies ending in a transport.
 */

import type { HttpRequest, HttpResponse } from "../http/types.js";
import type { HttpTransport } from "../transport/types.js";
import type { NextPolicy, PipelinePolicy } from "./policy.js";

export class Pipeline {
  private readonly policies: readonly PipelinePolicy[];
  private readonly transport: HttpTransport;

  constructor(policies: readonly PipelinePolicy[], transport: HttpTransport) {
    this.policies = Object.freeze([...policies]);
    this.transport = transport;
  }

  /**
   * Send a request through every policy and then the transport.
   */
  send(request: HttpRequest): Promise<HttpResponse> {
    return this.dispatch(0)(request);
  }

  getPolicies(): readonly PipelinePolicy[] {
    return this.policies;
  }

  getTransport(): HttpTransport {
    return this.transport;
  }

  /**
   * A pipeline with the same transport and a different policy list.
   */
  withPolicies(policies: readonly PipelinePolicy[]): Pipeline {
    return new Pipeline(policies, this.transport);
  }

  withTransport(transport: HttpTransport): Pipeline {
    return new Pipeline(this.policies, transport);
  }

  private dispatch(index: number): NextPolicy {
    const policy = this.policies[index];
    if (!policy) {
      return (request) => this.transport.send(request);
    }
    const next = this.dispatch(index + 1);
    return (request) => policy.send(request, next);
  }
}
