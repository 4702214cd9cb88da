export interface UserRow {
  id: string;
  sheet_name: string | null;
  created_at?: string;
  updated_at?: string;
}
