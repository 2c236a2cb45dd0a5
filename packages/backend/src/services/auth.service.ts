import { randomUUID } from 'crypto';
import type { DataContext } from '../lib/db/index.js';
import { ConflictError, NotFoundError, UnauthorizedError } from '../lib/errors.js';
import {
  getTokenExpiry,
  hashPassword,
  signAccessToken,
  verifyPassword,
} from '../lib/auth.js';
import type { User } from '../types/index.js';
import type {
  AuthResponse,
  LoginInput,
  RegisterInput,
  UserResponse,
} from '../schemas/auth.schema.js';

export interface TokenSettings {
  secret: string;
  /** Duration string such as `60m` or `7d`. */
  expiresIn: string;
}

/**
 * Transform user from database to response (exclude sensitive fields)
 */
function toUserResponse(user: User): UserResponse {
  return {
    id: user.id,
    username: user.username,
    email: user.email,
    createdAt: user.createdAt,
  };
}

export class AuthService {
  constructor(
    private readonly db: DataContext,
    private readonly tokens: TokenSettings
  ) {}

  /**
   * Register a new user and sign them in.
   */
  async register(input: RegisterInput): Promise<AuthResponse> {
    const email = input.email.toLowerCase();

    const [byUsername, byEmail] = await Promise.all([
      this.db.user.findUnique({ where: { username: input.username } }),
      this.db.user.findUnique({ where: { email } }),
    ]);

    if (byUsername) {
      throw new ConflictError(`Username '${input.username}' is already taken`);
    }
    if (byEmail) {
      throw new ConflictError(`Email '${email}' is already registered`);
    }

    const user = await this.db.user.create({
      data: {
        id: randomUUID(),
        username: input.username,
        email,
        passwordHash: await hashPassword(input.password),
        createdAt: new Date(),
      },
    });

    return this.issueToken(user);
  }

  /**
   * Login with username or email. Unknown users and wrong passwords
   * produce the same error.
   */
  async login(input: LoginInput): Promise<AuthResponse> {
    const user =
      (await this.db.user.findUnique({ where: { username: input.usernameOrEmail } })) ??
      (await this.db.user.findUnique({ where: { email: input.usernameOrEmail.toLowerCase() } }));

    if (!user || !(await verifyPassword(input.password, user.passwordHash))) {
      throw new UnauthorizedError('Invalid credentials');
    }

    return this.issueToken(user);
  }

  /**
   * Get user by ID
   */
  async getUserById(userId: string): Promise<UserResponse> {
    const user = await this.db.user.findUnique({ where: { id: userId } });

    if (!user) {
      throw new NotFoundError('User', userId);
    }

    return toUserResponse(user);
  }

  private async issueToken(user: User): Promise<AuthResponse> {
    const expiresAt = getTokenExpiry(this.tokens.expiresIn);
    const token = await signAccessToken(
      { sub: user.id, username: user.username, email: user.email },
      this.tokens.secret,
      expiresAt
    );

    return { token, expiresAt, user: toUserResponse(user) };
  }
}
