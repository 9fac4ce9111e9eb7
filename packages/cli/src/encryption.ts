import { createMessage, encrypt, type Message } from 'openpgp';
import type { SymmetricEncryptor } from '@lp-builds/launchpad';

/** Password-based OpenPGP encryption producing an armored message. */
export class OpenPgpEncryptor implements SymmetricEncryptor {
  async encrypt(plaintext: string, passphrase: string): Promise<string> {
    const message: Message<string> = await createMessage({ text: plaintext });
    return encrypt({ message, passwords: [passphrase], format: 'armored' });
  }
}
