import {
  ConfigError,
  IOError,
  RemoteError,
  ThumbnailerError,
  TransformError,
  errorMessage,
  isThumbnailerError,
} from '../errors';

describe('errors', () => {
  it('should map each class to its code and name', () => {
    expect(new IOError('x').code).toBe('IO_ERROR');
    expect(new RemoteError('x').code).toBe('REMOTE_ERROR');
    expect(new ConfigError('x').code).toBe('CONFIG_ERROR');
    expect(new ConfigError('x').name).toBe('ConfigError');
  });

  it('should derive the code from the transform kind', () => {
    const decode = new TransformError('DecodeFailed', 'bad header', { source: 'a.jpg' });
    const encode = new TransformError('EncodeFailed', 'no space');

    expect(decode.code).toBe('DECODE_FAILED');
    expect(decode.kind).toBe('DecodeFailed');
    expect(encode.code).toBe('ENCODE_FAILED');
    expect(decode).toBeInstanceOf(ThumbnailerError);
    expect(decode.toJSON()).toEqual({ code: 'DECODE_FAILED', message: 'bad header', details: { source: 'a.jpg' } });
  });

  it('should keep the underlying cause', () => {
    const cause = new Error('socket hang up');
    const err = new RemoteError('get failed', { key: 'a.jpg' }, cause);
    expect(err.cause).toBe(cause);
    expect(new RemoteError('plain').cause).toBeUndefined();
  });

  it('should recognise only its own errors', () => {
    expect(isThumbnailerError(new IOError('x'))).toBe(true);
    expect(isThumbnailerError(new Error('x'))).toBe(false);
    expect(isThumbnailerError('x')).toBe(false);
  });

  it('should read a message from anything thrown', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage('text')).toBe('text');
    expect(errorMessage(42)).toBe('42');
  });
});
