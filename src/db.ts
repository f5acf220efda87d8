import mysql from "mysql2/promise";
import { env } from "./config/env";

// DATETIME columns hold UTC; "Z" keeps mysql2 from shifting them to server-local time.
export const pool = mysql.createPool({
  host: env.db.host,
  port: env.db.port,
  user: env.db.user,
  password: env.db.password,
  database: env.db.name,
  waitForConnections: true,
  connectionLimit: env.db.connLimit,
  queueLimit: 0,
  timezone: "Z",
});
