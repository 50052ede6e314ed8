// pattern: Imperative Shell
import { LemmyHttp } from "lemmy-js-client";
import type { Logger } from "pino";
import type { AppConfig } from "../config";

export type PublishRequest = {
  readonly community: string;
  readonly account: string;
  readonly title: string;
  readonly url: string | null;
  readonly body: string | null;
};

/**
 * Discriminated union result type for post publish operations.
 */
export type PublishResult =
  | { readonly success: true; readonly postId: number }
  | { readonly success: false; readonly error: string };

/**
 * Publishes one post. Never throws; failures are returned in the result.
 */
export type PublishPostFn = (request: PublishRequest) => Promise<PublishResult>;

type EnvLookup = (name: string) => string | undefined;

function serverUrl(server: string): string {
  return /^https?:\/\//.test(server) ? server : `https://${server}`;
}

/**
 * Creates a Lemmy-backed publisher. Each configured account gets its own
 * client, logged in on first use with the password held in the environment
 * variable the account names. Community ids are resolved by name once and
 * cached.
 *
 * @param lemmy - The `lemmy` section of the application config
 * @param logger - Logger for post results
 * @param env - Environment lookup, `process.env` by default
 */
export function createLemmyPublisher(
  lemmy: AppConfig["lemmy"],
  logger: Logger,
  env: EnvLookup = (name) => process.env[name],
): PublishPostFn {
  const baseUrl = serverUrl(lemmy.server);
  const clients = new Map<string, Promise<LemmyHttp>>();
  const communityIds = new Map<string, number>();

  async function login(account: string): Promise<LemmyHttp> {
    const credentials = lemmy.accounts[account];
    if (!credentials) {
      throw new Error(`unknown account "${account}"`);
    }

    const password = env(credentials.passwordEnv);
    if (!password) {
      throw new Error(
        `password variable ${credentials.passwordEnv} for account "${account}" is not set`,
      );
    }

    const client = new LemmyHttp(baseUrl);
    const { jwt } = await client.login({
      username_or_email: credentials.username,
      password,
    });
    if (!jwt) {
      throw new Error(`login for account "${account}" returned no token`);
    }
    client.setHeaders({ Authorization: `Bearer ${jwt}` });

    logger.info({ account, server: lemmy.server }, "logged in to lemmy");
    return client;
  }

  function clientFor(account: string): Promise<LemmyHttp> {
    let pending = clients.get(account);
    if (!pending) {
      pending = login(account);
      clients.set(account, pending);
      // A failed login is retried on the next post rather than cached.
      void pending.catch(() => clients.delete(account));
    }
    return pending;
  }

  async function communityId(client: LemmyHttp, name: string): Promise<number> {
    const cached = communityIds.get(name);
    if (cached !== undefined) return cached;

    const response = await client.getCommunity({ name });
    const id = response.community_view.community.id;
    communityIds.set(name, id);
    return id;
  }

  return async function publishPost(
    request: PublishRequest,
  ): Promise<PublishResult> {
    try {
      const client = await clientFor(request.account);
      const community_id = await communityId(client, request.community);

      const response = await client.createPost({
        name: request.title,
        community_id,
        ...(request.url ? { url: request.url } : {}),
        ...(request.body ? { body: request.body } : {}),
      });

      const postId = response.post_view.post.id;
      logger.info(
        { postId, community: request.community, title: request.title },
        "post published",
      );
      return { success: true, postId };
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.error(
        { community: request.community, title: request.title, error: message },
        "post publish failed",
      );
      return { success: false, error: message };
    }
  };
}
