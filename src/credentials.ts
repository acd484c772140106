import { readFileSync } from "fs";
import { CredentialError, errorMessage } from "./errors.ts";

/**
 * Read an API token from a file. Surrounding whitespace (including the
 * trailing newline most editors add) is stripped.
 */
export function readCredential(path: string): string {
  let content: string;
  try {
    content = readFileSync(path, "utf-8");
  } catch (error) {
    throw new CredentialError(
      path,
      `Unable to read API token from ${path}: ${errorMessage(error)}`,
      { cause: error }
    );
  }

  const token = content.trim();
  if (!token) {
    throw new CredentialError(path, `API token file ${path} is empty`);
  }
  return token;
}
