import { mkdtempSync, rmSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { config } from "../src/config.js";
import { closeDatabase, getDb } from "../src/db/index.js";
import { createServer } from "../src/server.js";

export type TestApp = Awaited<ReturnType<typeof createServer>>;

export interface TestServer {
  app: TestApp;
  publicDir: string;
  close(): Promise<void>;
}

/** Fresh in-memory database and a throwaway public directory per server. */
export async function startTestServer(): Promise<TestServer> {
  closeDatabase();
  const publicDir = mkdtempSync(join(tmpdir(), "restaurant-test-"));
  config.publicDir = publicDir;

  const app = await createServer();
  return {
    app,
    publicDir,
    close: async () => {
      await app.close();
      rmSync(publicDir, { recursive: true, force: true });
    },
  };
}

export const FORM_HEADERS = { "content-type": "application/x-www-form-urlencoded" };

export function formBody(fields: Record<string, string>): string {
  return new URLSearchParams(fields).toString();
}

export interface TestFile {
  field: string;
  filename: string;
  data: Buffer;
  contentType?: string;
}

export function multipartBody(fields: Record<string, string>, files: TestFile[] = []) {
  const boundary = "----restaurant-test-boundary";
  const chunks: Buffer[] = [];

  for (const [name, value] of Object.entries(fields)) {
    chunks.push(Buffer.from(`--${boundary}\r\nContent-Disposition: form-data; name="${name}"\r\n\r\n${value}\r\n`));
  }
  for (const file of files) {
    chunks.push(
      Buffer.from(
        `--${boundary}\r\nContent-Disposition: form-data; name="${file.field}"; filename="${file.filename}"\r\n` +
          `Content-Type: ${file.contentType ?? "application/octet-stream"}\r\n\r\n`,
      ),
    );
    chunks.push(file.data, Buffer.from("\r\n"));
  }
  chunks.push(Buffer.from(`--${boundary}--\r\n`));

  return {
    payload: Buffer.concat(chunks),
    headers: { "content-type": `multipart/form-data; boundary=${boundary}` },
  };
}

/** Logs in through POST /login and returns the session cookie for inject(). */
export async function login(
  app: TestApp,
  username: string,
  password: string,
  opts: { customer?: boolean } = {},
): Promise<Record<string, string>> {
  const fields: Record<string, string> = { username, password };
  if (opts.customer) fields.is_student = "true";

  const res = await app.inject({ method: "POST", url: "/login", headers: FORM_HEADERS, payload: formBody(fields) });
  const cookie = res.cookies.find((c) => c.name === config.sessionCookieName);
  if (!cookie) {
    throw new Error(`login as ${username} failed with status ${res.statusCode}`);
  }
  return { [cookie.name]: cookie.value };
}

export function countRows(table: "users" | "menu_items" | "orders" | "order_items" | "menu_settings" | "sessions"): number {
  const row = getDb().prepare<[], { n: number }>(`SELECT COUNT(*) AS n FROM ${table}`).get();
  return row?.n ?? 0;
}
