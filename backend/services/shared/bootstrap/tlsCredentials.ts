// backend/services/shared/bootstrap/tlsCredentials.ts

import fs from "node:fs";
import path from "node:path";
import { TlsFileError } from "./errors";

export interface TlsCredentials {
  key: Buffer;
  cert: Buffer;
}

const PEM_KEY_RE = /-----BEGIN [A-Z ]*PRIVATE KEY-----/;
const PEM_CERT_RE = /-----BEGIN CERTIFICATE-----/;

function readPem(
  role: "key" | "certificate",
  file: string,
  marker: RegExp,
  cwd: string
): Buffer {
  const resolved = path.resolve(cwd, file);
  let data: Buffer;
  try {
    data = fs.readFileSync(resolved);
  } catch (err) {
    const code =
      typeof err === "object" && err !== null && "code" in err
        ? String(err.code)
        : undefined;
    const reason =
      code === "ENOENT"
        ? "file not found"
        : code === "EACCES"
          ? "permission denied"
          : code === "EISDIR"
            ? "is a directory"
            : `unreadable (${code ?? String(err)})`;
    throw new TlsFileError(role, resolved, reason, err);
  }
  if (!marker.test(data.toString("utf8"))) {
    throw new TlsFileError(role, resolved, "not a PEM-encoded " + role);
  }
  return data;
}

/** Read the PEM private key and certificate chain once, at process start. */
export function loadTlsCredentials(
  keyfile: string,
  certfile: string,
  cwd: string = process.cwd()
): TlsCredentials {
  return {
    key: readPem("key", keyfile, PEM_KEY_RE, cwd),
    cert: readPem("certificate", certfile, PEM_CERT_RE, cwd),
  };
}
