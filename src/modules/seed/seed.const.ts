import { MANAGER, type RoleName, STAFF } from "../auth/auth.types";

/**
 * Tables added after the first release. Databases created before them get
 * patched on startup; every statement is a no-op once applied.
 */
export const SCHEMA_PATCH_STATEMENTS = [
  `DO $$ BEGIN
     CREATE TYPE notification_type AS ENUM ('Info', 'Success', 'Warning', 'Error', 'Danger');
   EXCEPTION WHEN duplicate_object THEN NULL;
   END $$`,
  `CREATE TABLE IF NOT EXISTS categories (
     id serial PRIMARY KEY,
     name varchar(50) NOT NULL,
     description varchar(200),
     icon_url varchar(200),
     is_active boolean NOT NULL DEFAULT true,
     created_at timestamptz NOT NULL DEFAULT now()
   )`,
  "CREATE UNIQUE INDEX IF NOT EXISTS categories_name_key ON categories (name)",
  `CREATE TABLE IF NOT EXISTS favorites (
     id serial PRIMARY KEY,
     user_id text NOT NULL REFERENCES users (id) ON DELETE CASCADE,
     car_id integer NOT NULL REFERENCES cars (id) ON DELETE CASCADE,
     created_at timestamptz NOT NULL DEFAULT now()
   )`,
  "CREATE UNIQUE INDEX IF NOT EXISTS favorites_user_id_car_id_key ON favorites (user_id, car_id)",
  `CREATE TABLE IF NOT EXISTS notifications (
     id serial PRIMARY KEY,
     user_id text NOT NULL REFERENCES users (id) ON DELETE CASCADE,
     title varchar(200) NOT NULL,
     message varchar(1000),
     type notification_type NOT NULL DEFAULT 'Info',
     is_read boolean NOT NULL DEFAULT false,
     created_at timestamptz NOT NULL DEFAULT now()
   )`,
] as const;

export interface DefaultAccount {
  localPart: string;
  firstName: string;
  lastName: string;
  phoneNumber: string;
  role: RoleName;
}

export const DEFAULT_ACCOUNTS: DefaultAccount[] = [
  {
    localPart: "manager",
    firstName: "Admin",
    lastName: "Manager",
    phoneNumber: "+60123450001",
    role: MANAGER,
  },
  {
    localPart: "staff",
    firstName: "Front",
    lastName: "Desk",
    phoneNumber: "+60123450002",
    role: STAFF,
  },
];
