import { Launchpad, type LaunchpadOptions } from "../launchpad.js";
import type { SymmetricEncryptor } from "../encryption.js";
import { FAKE_ROOT, FakeLaunchpad } from "./fake-launchpad.js";

export const TEST_CREDENTIALS = {
  username: "builder",
  token: "test-token",
  secret: "test-secret",
};

export function createTestLaunchpad(
  fake: FakeLaunchpad,
  extras: Partial<LaunchpadOptions> = {},
): Launchpad {
  return new Launchpad({
    credentials: TEST_CREDENTIALS,
    baseUrl: FAKE_ROOT,
    fetch: fake.fetch,
    ...extras,
  });
}

/** Records what it was asked to encrypt and answers with a marker string. */
export class RecordingEncryptor implements SymmetricEncryptor {
  calls: Array<{ plaintext: string; passphrase: string }> = [];

  async encrypt(plaintext: string, passphrase: string): Promise<string> {
    this.calls.push({ plaintext, passphrase });
    return `ENCRYPTED(${plaintext.length})`;
  }
}
