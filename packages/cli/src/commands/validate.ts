import { loadCatalog, loadConfig } from '../config-loader.js';

export function validateCommand(configPath?: string): void {
  try {
    const config = loadConfig(configPath);
    const catalog = loadCatalog(config);
    console.log('Configuration is valid!');
    console.log('');
    console.log('Settings:');
    console.log(`  API root:         ${config.launchpad.baseUrl}`);
    console.log(`  Username:         ${config.launchpad.username}`);
    console.log(`  Consumer key:     ${config.launchpad.consumerKey ?? config.launchpad.username}`);
    console.log(`  Architectures:    ${config.snaps.architectures.join(', ')}`);
    console.log(`  GPG passphrase:   ${config.images.gpgPassphrase ? '(set)' : '(none)'}`);
    console.log(`  Receiver port:    ${config.receiver.port}`);
    console.log(`  Receiver secret:  ${config.receiver.secret ? '(set)' : '(none)'}`);
    console.log(`  Board catalog:    ${catalog ? `${config.catalogPath} (${catalog.size} entries)` : '(built-in)'}`);
  } catch (err) {
    console.error('Configuration validation failed!');
    if (err instanceof Error) {
      console.error(err.message);
    }
    process.exit(1);
  }
}
