// src/users/user-directory.ts

export type PublicProfile = {
  id: string;
  name: string;
  username: string;
  phoneNumber: string | null;
};

/** Read-only lookup other modules use to resolve call parties and chat members. */
export abstract class UserDirectory {
  abstract findProfile(userId: string): Promise<PublicProfile | null>;
}
