export interface MastodonApplication {
  id?: string;
  name: string;
  website?: string | null;
  client_id: string;
  client_secret: string;
}

export interface MastodonToken {
  access_token: string;
  token_type: string;
  scope: string;
  created_at: number;
}

export interface MastodonAccount {
  id: string;
  username: string;
  acct: string;
  url: string;
}

export interface MastodonStatus {
  id: string;
  uri: string;
  url: string | null;
  content: string;
  created_at: string;
}
