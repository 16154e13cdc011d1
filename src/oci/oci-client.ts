/**
 * OCI Distribution Spec client (read operations only)
 *
 * Native TypeScript implementation for enumerating repositories, tags
 * and manifest digests of OCI-compliant registries.
 *
 * @see https://github.com/opencontainers/distribution-spec/blob/main/spec.md
 */

import { createHash } from "crypto";
import type { ZodType, ZodTypeDef } from "zod";
import type { HttpClient, RegistryCredentials } from "#/core";
import { OciCatalogSchema, OciTagsListSchema, OciTokenResponseSchema } from "#/schemas";
import type {
  OciRegistryConfig,
  ListRepositoriesResult,
  ListTagsResult,
  ManifestDigestResult,
} from "./oci.types";
import { CONTENT_DIGEST_HEADER, MANIFEST_MEDIA_TYPES } from "./oci.types";

const DEFAULT_PAGE_SIZE = 100;
const USER_AGENT = "regsync";

type Page<T> = { success: true; items: T[] } | { success: false; error: string };

export class OciClient {
  private host: string;
  private credentials?: RegistryCredentials;
  private pageSize: number;
  private http: HttpClient;
  private tokenCache: Map<string, string> = new Map();

  constructor(config: OciRegistryConfig, http: HttpClient) {
    this.host = config.host;
    this.credentials = config.credentials;
    this.pageSize = config.pageSize ?? DEFAULT_PAGE_SIZE;
    this.http = http;
  }

  /**
   * Get request headers for OCI registry API
   */
  private getHeaders(accept?: string): Record<string, string> {
    const headers: Record<string, string> = {
      "User-Agent": USER_AGENT,
    };

    if (accept) {
      headers["Accept"] = accept;
    }

    return headers;
  }

  private get baseUrl(): string {
    return `https://${this.host}`;
  }

  /**
   * Build OCI registry URL
   * @param name - Repository name (e.g., "myorg/my-image")
   * @param path - API path after the name
   */
  private buildUrl(name: string, path: string): string {
    return `${this.baseUrl}/v2/${name}${path}`;
  }

  /**
   * Parse WWW-Authenticate header from a 401 response
   *
   * Expected format: Bearer realm="<url>",service="<service>",scope="<scope>"
   * Catalog challenges may omit the scope.
   */
  private parseWwwAuthenticate(
    header: string
  ): { realm: string; service?: string; scope?: string } | undefined {
    if (!header.startsWith("Bearer ")) {
      return undefined;
    }

    const params = header.slice("Bearer ".length);
    const realm = params.match(/realm="([^"]+)"/)?.[1];
    const service = params.match(/service="([^"]+)"/)?.[1];
    const scope = params.match(/scope="([^"]+)"/)?.[1];

    if (!realm) {
      return undefined;
    }

    return { realm, service, scope };
  }

  /**
   * Exchange credentials for a temporary registry Bearer token
   *
   * OCI registries require an OAuth2-like token exchange:
   * 1. Initial request returns 401 with WWW-Authenticate header
   * 2. Call the token endpoint, with Basic auth (username:password) when
   *    credentials are configured and anonymously otherwise
   * 3. Use the returned token for subsequent requests
   */
  private async exchangeToken(wwwAuthenticate: string): Promise<string | undefined> {
    const params = this.parseWwwAuthenticate(wwwAuthenticate);
    if (!params) {
      return undefined;
    }

    const cacheKey = `${params.service ?? ""}:${params.scope ?? ""}`;
    const cached = this.tokenCache.get(cacheKey);
    if (cached) {
      return cached;
    }

    const tokenUrl = new URL(params.realm);
    if (params.service) tokenUrl.searchParams.set("service", params.service);
    if (params.scope) tokenUrl.searchParams.set("scope", params.scope);

    const headers = this.getHeaders();
    if (this.credentials) {
      const { username, password } = this.credentials;
      headers["Authorization"] = `Basic ${Buffer.from(`${username}:${password}`).toString("base64")}`;
    }

    const response = await this.http.fetch(tokenUrl.toString(), { headers });

    if (!response.ok) {
      return undefined;
    }

    const parsed = OciTokenResponseSchema.safeParse(await response.json());
    const exchangedToken = parsed.success ? parsed.data.token ?? parsed.data.access_token : undefined;

    if (exchangedToken) {
      this.tokenCache.set(cacheKey, exchangedToken);
    }

    return exchangedToken;
  }

  /**
   * Fetch with automatic token exchange on 401 responses
   *
   * 1. Make the request with current credentials
   * 2. If 401 with WWW-Authenticate, exchange for a registry token
   * 3. Retry the request with the exchanged token
   */
  private async authenticatedFetch(url: string, options: RequestInit = {}): Promise<Response> {
    const response = await this.http.fetch(url, options);

    if (response.status !== 401) {
      return response;
    }

    const wwwAuthenticate = response.headers.get("www-authenticate");
    if (!wwwAuthenticate) {
      return response;
    }

    const exchangedToken = await this.exchangeToken(wwwAuthenticate);
    if (!exchangedToken) {
      return response;
    }

    const retryHeaders = new Headers(options.headers);
    retryHeaders.set("Authorization", `Bearer ${exchangedToken}`);

    return this.http.fetch(url, { ...options, headers: retryHeaders });
  }

  /**
   * Next page URL from a Link header
   *
   * Expected format: </v2/_catalog?last=b&n=100>; rel="next"
   */
  private nextPageUrl(response: Response): string | undefined {
    const link = response.headers.get("link");
    const target = link?.match(/<([^>]+)>\s*;\s*rel="?next"?/)?.[1];
    return target ? new URL(target, this.baseUrl).toString() : undefined;
  }

  /**
   * Follow Link pagination, collecting every page
   */
  private async collectPages<Output, Input>(
    firstUrl: string,
    schema: ZodType<Output, ZodTypeDef, Input>,
    pick: (page: Output) => string[] | null,
    what: string,
    notFoundIsEmpty: boolean
  ): Promise<Page<string>> {
    const items: string[] = [];
    const visited = new Set<string>();
    let url: string | undefined = firstUrl;

    // A Link header pointing back at a visited page ends the listing
    while (url && !visited.has(url)) {
      visited.add(url);
      const response = await this.authenticatedFetch(url, {
        headers: this.getHeaders("application/json"),
      });

      if (!response.ok) {
        if (response.status === 404 && notFoundIsEmpty) {
          return { success: true, items };
        }
        return {
          success: false,
          error: `Failed to list ${what}: ${response.status} ${response.statusText}`,
        };
      }

      const parsed = schema.safeParse(await response.json());
      if (!parsed.success) {
        return { success: false, error: `Failed to list ${what}: unexpected response body` };
      }

      items.push(...(pick(parsed.data) ?? []));
      url = this.nextPageUrl(response);
    }

    return { success: true, items };
  }

  /**
   * List all repositories
   *
   * GET /v2/_catalog?n=<page size>
   */
  async listRepositories(): Promise<ListRepositoriesResult> {
    try {
      const page = await this.collectPages(
        `${this.baseUrl}/v2/_catalog?n=${this.pageSize}`,
        OciCatalogSchema,
        (data) => data.repositories,
        "repositories",
        false
      );
      return page.success
        ? { success: true, repositories: page.items }
        : { success: false, error: page.error };
    } catch (err) {
      const message = err instanceof Error ? err.message : "Unknown error";
      return { success: false, error: `Failed to list repositories: ${message}` };
    }
  }

  /**
   * List all tags for a repository
   *
   * GET /v2/<name>/tags/list?n=<page size>
   */
  async listTags(name: string): Promise<ListTagsResult> {
    try {
      // A missing repository has no tags
      const page = await this.collectPages(
        this.buildUrl(name, `/tags/list?n=${this.pageSize}`),
        OciTagsListSchema,
        (data) => data.tags,
        "tags",
        true
      );
      return page.success ? { success: true, tags: page.items } : { success: false, error: page.error };
    } catch (err) {
      const message = err instanceof Error ? err.message : "Unknown error";
      return { success: false, error: `Failed to list tags: ${message}` };
    }
  }

  /**
   * Resolve a tag to its manifest digest
   *
   * HEAD /v2/<name>/manifests/<reference>, reading Docker-Content-Digest.
   * Registries that omit the header get a GET, and the digest is computed
   * from the manifest bytes.
   */
  async getManifestDigest(name: string, reference: string): Promise<ManifestDigestResult> {
    try {
      const url = this.buildUrl(name, `/manifests/${reference}`);
      const headers = this.getHeaders(MANIFEST_MEDIA_TYPES.join(", "));

      const head = await this.authenticatedFetch(url, { method: "HEAD", headers });
      if (head.status === 404) {
        return { success: true };
      }
      if (!head.ok) {
        return {
          success: false,
          error: `Failed to resolve manifest ${name}:${reference}: ${head.status} ${head.statusText}`,
        };
      }

      const digest = head.headers.get(CONTENT_DIGEST_HEADER);
      if (digest) {
        return { success: true, digest };
      }

      const response = await this.authenticatedFetch(url, { headers });
      if (!response.ok) {
        return {
          success: false,
          error: `Failed to pull manifest ${name}:${reference}: ${response.status} ${response.statusText}`,
        };
      }

      const body = Buffer.from(await response.arrayBuffer());
      return { success: true, digest: `sha256:${createHash("sha256").update(body).digest("hex")}` };
    } catch (err) {
      const message = err instanceof Error ? err.message : "Unknown error";
      return { success: false, error: `Failed to resolve manifest: ${message}` };
    }
  }
}
