// Stored shape of a registered user.
export interface UserRecord {
  id: string;
  username: string;
  email: string;
  createdAt: string;
}
