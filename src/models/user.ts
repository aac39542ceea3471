export interface UserRow {
  id: number;
  username: string;
  karma: number | null;
  created_time: string | null;
  about: string | null;
  last_updated: string;
}

export interface UserInput {
  username: string;
  karma?: number | null;
  created_time?: string | null;
  about?: string | null;
}

export interface UserView {
  id: number;
  username: string;
  karma: number | null;
  created_time: string | null;
  about: string | null;
}
