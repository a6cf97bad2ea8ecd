/**
 * ADB credential store backed by a key file
 *
 * The RSA private key is stored as PKCS#8 PEM. It is created the first time
 * the device asks for a public key and reused afterwards, so a frame that has
 * already authorized this host keeps accepting it.
 */

import type { AdbCredentialStore, AdbPrivateKey } from "@yume-chan/adb";
import { createPrivateKey, generateKeyPairSync } from "crypto";
import { mkdir, readFile, writeFile, access } from "fs/promises";
import { constants } from "fs";
import { dirname } from "path";
import { hostname } from "os";
import { createLogger } from "../log";

const log = createLogger("adb");

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

export class FileCredentialStore implements AdbCredentialStore {
  readonly keyPath: string;
  private name: string;

  constructor(keyPath: string, name = `frameo-control@${hostname()}`) {
    this.keyPath = keyPath;
    this.name = name;
  }

  /**
   * Return the stored key, creating it when absent
   */
  async generateKey(): Promise<AdbPrivateKey> {
    const existing = await this.load();
    if (existing) {
      return existing;
    }

    log.info(`No ADB key found, generating a new one at ${this.keyPath}`);
    const { privateKey } = generateKeyPairSync("rsa", {
      modulusLength: 2048,
      publicExponent: 0x10001,
    });
    await mkdir(dirname(this.keyPath), { recursive: true });
    await writeFile(this.keyPath, privateKey.export({ type: "pkcs8", format: "pem" }), {
      mode: 0o600,
    });
    log.info("!!!!!! ACTION REQUIRED !!!!!! Check the device screen to 'Allow USB Debugging'.");

    return {
      buffer: new Uint8Array(privateKey.export({ type: "pkcs8", format: "der" })),
      name: this.name,
    };
  }

  async *iterateKeys(): AsyncGenerator<AdbPrivateKey, void, void> {
    const key = await this.load();
    if (key) {
      yield key;
    }
  }

  /**
   * Stored key, or null when the file does not exist yet
   */
  async load(): Promise<AdbPrivateKey | null> {
    let pem: string;
    try {
      pem = await readFile(this.keyPath, "utf-8");
    } catch (err) {
      if (isMissingFile(err)) return null;
      throw err;
    }

    log.debug(`Loading ADB key from ${this.keyPath}`);
    const der = createPrivateKey(pem).export({ type: "pkcs8", format: "der" });
    return { buffer: new Uint8Array(der), name: this.name };
  }

  /**
   * True if a key exists, or one could be written under the key directory
   */
  async isUsable(): Promise<boolean> {
    if (await canAccess(this.keyPath, constants.R_OK)) {
      return true;
    }
    // mkdir is recursive, so the nearest existing ancestor decides
    let dir = dirname(this.keyPath);
    while (!(await canAccess(dir, constants.F_OK))) {
      const parent = dirname(dir);
      if (parent === dir) return false;
      dir = parent;
    }
    return canAccess(dir, constants.W_OK);
  }
}

async function canAccess(path: string, mode: number): Promise<boolean> {
  try {
    await access(path, mode);
    return true;
  } catch {
    return false;
  }
}
