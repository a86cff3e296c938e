export type UserProfileRecord = {
  id: string;
  google_id: string;
  email: string;
  name: string;
  picture: string;
  about_me: string;
  age: number | null;
  created_at: Date | null;
  last_login: Date | null;
};

export type UserUpsertFields = Partial<Omit<UserProfileRecord, 'google_id'>>;

export type UserProfileUpdate = Partial<Pick<UserProfileRecord, 'name' | 'about_me' | 'age'>>;

export type UpsertByProviderIdOptions = {
  /** Written only when the document does not exist yet */
  onInsert?: UserUpsertFields;
};

export interface UserRepository {
  upsertByProviderId(
    googleId: string,
    fields: UserUpsertFields,
    options?: UpsertByProviderIdOptions,
  ): Promise<UserProfileRecord>;
  findByProviderId(googleId: string): Promise<UserProfileRecord | null>;
  updateFields(googleId: string, updates: UserProfileUpdate): Promise<UserProfileRecord | null>;
}
