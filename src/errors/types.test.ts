import { AppError, ErrorCode } from './types';

describe('AppError', () => {
  it('sets fields correctly via constructor', () => {
    const err = new AppError('test message', ErrorCode.STORE_READ_FAILED, { store: 'file' }, true);
    expect(err.message).toBe('test message');
    expect(err.code).toBe(ErrorCode.STORE_READ_FAILED);
    expect(err.details).toEqual({ store: 'file' });
    expect(err.isRecoverable).toBe(true);
    expect(err.name).toBe('AppError');
  });

  it('is an instance of Error', () => {
    expect(new AppError('msg', ErrorCode.UNKNOWN_ERROR)).toBeInstanceOf(Error);
  });

  it('defaults isRecoverable to false', () => {
    expect(new AppError('msg', ErrorCode.UNKNOWN_ERROR).isRecoverable).toBe(false);
  });
});

describe('toUserMessage', () => {
  it('returns non-empty string for all ErrorCode values', () => {
    for (const code of Object.values(ErrorCode)) {
      const msg = new AppError('fallback', code).toUserMessage();
      expect(msg.length).toBeGreaterThan(0);
    }
  });

  it('names the unavailable store', () => {
    const err = new AppError('x', ErrorCode.STORE_UNAVAILABLE, { store: 'secret-tool' });
    expect(err.toUserMessage()).toBe('Credential store is not available: secret-tool');
  });

  it('names the missing identifier', () => {
    const err = new AppError('x', ErrorCode.ENTRY_NOT_FOUND, { identifier: 'alice' });
    expect(err.toUserMessage()).toBe('No stored secret for: alice');
  });

  it('says unknown when a detail is missing', () => {
    expect(new AppError('x', ErrorCode.FILE_NOT_FOUND).toUserMessage()).toBe('File not found: unknown');
  });

  it('uses the message for validation errors', () => {
    const err = new AppError('Folder name must not be empty', ErrorCode.VALIDATION_ERROR);
    expect(err.toUserMessage()).toBe('Folder name must not be empty');
  });

  it('uses the message for unknown errors', () => {
    expect(new AppError('boom', ErrorCode.UNKNOWN_ERROR).toUserMessage()).toBe('boom');
  });
});

describe('getRecoverySuggestion', () => {
  it('suggests how to store a missing secret', () => {
    const err = new AppError('x', ErrorCode.ENTRY_NOT_FOUND);
    expect(err.getRecoverySuggestion()).toBe('Store it with: keyring-askpass credential store --identifier <id>');
  });

  it('suggests another store when one is unavailable', () => {
    const err = new AppError('x', ErrorCode.STORE_UNAVAILABLE);
    expect(err.getRecoverySuggestion()).toBe('Check --store and --wallet-file, or use --store none');
  });

  it('returns null when there is nothing to suggest', () => {
    expect(new AppError('x', ErrorCode.STORE_CLOSED).getRecoverySuggestion()).toBeNull();
  });
});
