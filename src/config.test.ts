import { loadConfig } from './config';
import { DEFAULT_FOLDER, DEFAULT_WALLET_FILE } from './constants';
import { LogLevel } from './utils/logger';

describe('loadConfig', () => {
  it('falls back to defaults', () => {
    expect(loadConfig({}, {})).toEqual({
      store: 'file',
      walletFile: DEFAULT_WALLET_FILE,
      folder: DEFAULT_FOLDER,
      logLevel: LogLevel.WARN,
    });
  });

  it('reads the environment', () => {
    const config = loadConfig({}, {
      KEYRING_ASKPASS_STORE: 'keyring',
      KEYRING_ASKPASS_WALLET: '/tmp/wallet.json',
      KEYRING_ASKPASS_FOLDER: 'work',
      DEBUG: '1',
    });

    expect(config).toEqual({
      store: 'secret-tool',
      walletFile: '/tmp/wallet.json',
      folder: 'work',
      logLevel: LogLevel.DEBUG,
    });
  });

  it('prefers options over the environment', () => {
    const config = loadConfig(
      { store: 'none', walletFile: '/opt/w.json', folder: 'home' },
      { KEYRING_ASKPASS_STORE: 'file', KEYRING_ASKPASS_WALLET: '/tmp/wallet.json', KEYRING_ASKPASS_FOLDER: 'work' },
    );

    expect(config.store).toBe('none');
    expect(config.walletFile).toBe('/opt/w.json');
    expect(config.folder).toBe('home');
  });

  it('ignores blank store and wallet settings', () => {
    const config = loadConfig({}, { KEYRING_ASKPASS_STORE: ' ', KEYRING_ASKPASS_WALLET: '' });

    expect(config.store).toBe('file');
    expect(config.walletFile).toBe(DEFAULT_WALLET_FILE);
  });

  it('rejects an empty folder', () => {
    expect(() => loadConfig({ folder: ' ' }, {})).toThrow('Folder name must not be empty');
  });

  it('rejects an unknown store', () => {
    expect(() => loadConfig({ store: 'vault' }, {})).toThrow('Unknown credential store: vault');
  });

  it('lets quiet win over debug', () => {
    expect(loadConfig({ debug: true }, {}).logLevel).toBe(LogLevel.DEBUG);
    expect(loadConfig({ debug: true, quiet: true }, {}).logLevel).toBe(LogLevel.SILENT);
  });
});
