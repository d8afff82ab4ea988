/**
 * In-Memory User Service
 *
 * Reference {@link UserService} for development and tests. Users are keyed
 * by provider and provider-side ID; each gets an opaque application token
 * that later requests present as `Authorization: token <value>`.
 *
 * Host applications with a user database supply their own implementation.
 *
 * @module auth/oauth/user-service
 */

import { randomBytes } from "node:crypto";
import type { Logger } from "pino";
import { getComponentLogger } from "../../logging/index.js";
import type { OAuthClient, User, UserService } from "./oauth-types.js";

/**
 * Options for {@link InMemoryUserService}
 */
export interface InMemoryUserServiceOptions {
  /** Token generator, overridable in tests */
  generateToken?: () => string;
}

/**
 * A user with no identity and no token
 */
export function createGuestUser(): User {
  return { id: "", token: "" };
}

export class InMemoryUserService implements UserService {
  private readonly usersById = new Map<string, User>();
  private readonly usersByToken = new Map<string, User>();
  private readonly generateToken: () => string;
  private _logger: Logger | null = null;

  constructor(options: InMemoryUserServiceOptions = {}) {
    this.generateToken = options.generateToken ?? (() => randomBytes(20).toString("hex"));
  }

  private get logger(): Logger {
    if (!this._logger) {
      this._logger = getComponentLogger("auth:users");
    }
    return this._logger;
  }

  async findOrNew(credential: string | false): Promise<User> {
    if (credential === false) {
      return createGuestUser();
    }
    return this.usersByToken.get(credential) ?? createGuestUser();
  }

  async createUser(client: OAuthClient, accessToken: string): Promise<User> {
    const profile = await client.fetchUserInfo(accessToken);
    const id = `${client.providerType}:${profile.id}`;

    const existing = this.usersById.get(id);
    if (existing) {
      this.logger.debug({ userId: id }, "Returning user signed in again");
      return existing;
    }

    const user: User = {
      id,
      token: this.generateToken(),
      provider: client.providerType,
      name: profile.name,
      email: profile.email,
    };
    this.usersById.set(id, user);
    this.usersByToken.set(user.token, user);

    this.logger.info({ userId: id, provider: client.providerType }, "User created");
    return user;
  }

  /**
   * Number of users created so far
   */
  get size(): number {
    return this.usersById.size;
  }
}
