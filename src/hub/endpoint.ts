import { cfg } from "../config.js";

export interface EndpointResolver {
  getEndpoint(): string;
}

export function createEndpointResolver(endpoint: string = cfg.hub.endpoint): EndpointResolver {
  const normalized = endpoint.trim().replace(/\/+$/, "");
  if (!normalized) throw new Error("hub endpoint must not be empty");
  return { getEndpoint: () => normalized };
}
