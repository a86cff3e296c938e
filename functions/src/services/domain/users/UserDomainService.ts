import { randomUUID } from 'crypto';
import type {
  UserProfileRecord,
  UserProfileUpdate,
  UserRepository,
  UserUpsertFields,
} from '../../repositories/users/UserRepository';

export type LoginIdentity = {
  subject: string;
  email: string;
  name: string;
  picture?: string;
};

export type UserDomainServiceOptions = {
  /**
   * Clear about_me/age on every login instead of only on first login.
   * Kept behind a flag until product confirms which behavior is wanted.
   */
  resetProfileOnLogin?: boolean;
  now?: () => Date;
  generateId?: () => string;
};

export class UserDomainService {
  private readonly now: () => Date;
  private readonly generateId: () => string;

  constructor(
    private readonly userRepository: UserRepository,
    private readonly options: UserDomainServiceOptions = {},
  ) {
    this.now = options.now ?? (() => new Date());
    this.generateId = options.generateId ?? randomUUID;
  }

  async getByProviderId(googleId: string): Promise<UserProfileRecord | null> {
    return this.userRepository.findByProviderId(googleId);
  }

  async recordLogin(identity: LoginIdentity): Promise<UserProfileRecord> {
    const now = this.now();
    const fields: UserUpsertFields = {
      email: identity.email,
      name: identity.name,
      picture: identity.picture ?? '',
      last_login: now,
    };

    if (this.options.resetProfileOnLogin) {
      fields.about_me = '';
      fields.age = null;
    }

    return this.userRepository.upsertByProviderId(identity.subject, fields, {
      onInsert: {
        id: this.generateId(),
        about_me: '',
        age: null,
        created_at: now,
      },
    });
  }

  async updateProfile(
    googleId: string,
    updates: UserProfileUpdate,
  ): Promise<UserProfileRecord | null> {
    return this.userRepository.updateFields(googleId, updates);
  }
}
