/**
 * Symmetric encryption of the image author metadata. The result is an
 * ASCII-armored ciphertext that Launchpad stores without reading it.
 */
export interface SymmetricEncryptor {
  encrypt(plaintext: string, passphrase: string): Promise<string>;
}
