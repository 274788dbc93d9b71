import { AxiosHeaders, AxiosResponse } from "axios";
import { ListingClient } from "../src/github/api.js";
import { PageSequence } from "../src/github/pagination.js";
import { JsonValue, RepositoryDescriptor } from "../src/types.js";

export function axiosResponse(
  status: number,
  data: JsonValue,
  headers: Record<string, string> = {}
): AxiosResponse<JsonValue> {
  return {
    status,
    statusText: String(status),
    data,
    headers,
    config: { headers: new AxiosHeaders() }
  };
}

export function repository(name: string, stars: number, forks: number): RepositoryDescriptor {
  return {
    name,
    fullName: `octo/${name}`,
    url: `https://github.com/octo/${name}`,
    stars,
    forks,
    isFork: false,
    isArchived: false,
    isPrivate: false
  };
}

/**
 * In-process stand-in for the API client. Routes are matched on the endpoint
 * path without its query string; unknown paths answer with an empty list.
 */
export function fakeClient(routes: Record<string, JsonValue[] | Error>): ListingClient & { readonly calls: string[] } {
  const calls: string[] = [];
  const answer = async (endpoint: string): Promise<JsonValue[]> => {
    calls.push(endpoint);
    const route = routes[endpoint.split("?")[0] ?? endpoint];
    if (route instanceof Error) {
      throw route;
    }
    return route ?? [];
  };
  return {
    calls,
    list: answer,
    pages: endpoint => new PageSequence(endpoint, async url => ({ items: await answer(url) }))
  };
}
