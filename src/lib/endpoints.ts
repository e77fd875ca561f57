// Service or container name -> externally reachable URLs
export type EndpointMap = ReadonlyMap<string, readonly string[]>;

// Key used when only bare listener ports are known
export const UNKNOWN_SERVICES = 'unknown-services';

export function endpointsToObject(endpoints: EndpointMap): Record<string, string[]> {
  return Object.fromEntries([...endpoints].map(([service, urls]) => [service, [...urls]]));
}
