import { config } from "dotenv";
import { defineConfig } from "drizzle-kit";

config({ path: ".env.local" });

export default defineConfig({
  schema: "./src/db/schema",
  out: "./src/db/migrations",
  dialect: "mysql",
  dbCredentials: {
    host: process.env.DNSPROBE_DB_HOST || "localhost",
    port: parseInt(process.env.DNSPROBE_DB_PORT || "3306", 10),
    user: process.env.DNSPROBE_DB_USER || "root",
    password: process.env.DNSPROBE_DB_PASSWORD || "",
    database: process.env.DNSPROBE_DB_NAME || "dnsprobe",
  },
  verbose: true,
  strict: true,
});
