/**
 * HTTP plumbing shared by the speech providers.
 */

import { ProviderError, errorMessage } from '../shared/errors.js';

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

/**
 * Perform one request and map transport and status failures onto
 * ProviderError.
 */
export async function providerRequest(
  provider: string,
  fetchImpl: FetchLike,
  url: string,
  init: RequestInit
): Promise<Response> {
  let response: Response;
  try {
    response = await fetchImpl(url, init);
  } catch (err: unknown) {
    throw new ProviderError(provider, 'network', `request failed: ${errorMessage(err)}`, {
      cause: err,
    });
  }

  if (response.ok) return response;

  let detail = '';
  try {
    detail = (await response.text()).slice(0, 200);
  } catch (err: unknown) {
    detail = errorMessage(err);
  }
  const status = `HTTP ${response.status}${detail ? `: ${detail}` : ''}`;

  if (response.status === 401 || response.status === 403) {
    throw new ProviderError(provider, 'auth', `authentication failed (${status})`);
  }
  if (response.status === 429) {
    throw new ProviderError(provider, 'quota', `rate limited or quota exceeded (${status})`);
  }
  throw new ProviderError(provider, 'backend', `request rejected (${status})`);
}
