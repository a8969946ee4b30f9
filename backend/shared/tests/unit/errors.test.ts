import {
  AuthenticationError,
  BaseError,
  ErrorCode,
  InsufficientQuantityError,
  NotFoundError,
  ServiceClientError,
  isOperationalError,
  toErrorFrame,
  withFallback,
} from '../../src';

describe('toErrorFrame', () => {
  it('should keep the message of operational errors', () => {
    expect(toErrorFrame(new NotFoundError('Item'), 'Failed to get item'))
      .toEqual({ type: 'Error', message: 'Item not found' });
    expect(toErrorFrame(AuthenticationError.sessionExpired(), 'Search failed'))
      .toEqual({ type: 'Error', message: 'Session expired' });
  });

  it('should use the fallback for everything else', () => {
    expect(toErrorFrame(new ServiceClientError('connection refused', 'catalog-service'), 'Search failed'))
      .toEqual({ type: 'Error', message: 'Search failed' });
    expect(toErrorFrame(new TypeError('oops'), 'Search failed'))
      .toEqual({ type: 'Error', message: 'Search failed' });
    expect(toErrorFrame('string thrown', 'Search failed'))
      .toEqual({ type: 'Error', message: 'Search failed' });
  });
});

describe('withFallback', () => {
  it('should resolve with the value of the step', async () => {
    await expect(withFallback(Promise.resolve(42), 'unused')).resolves.toBe(42);
  });

  it('should rethrow operational errors unchanged', async () => {
    const error = new InsufficientQuantityError(6, 5);

    await expect(withFallback(Promise.reject(error), 'Failed to add to cart')).rejects.toBe(error);
  });

  it('should turn other failures into an operational error carrying the fallback', async () => {
    const pending = withFallback(
      Promise.reject(new ServiceClientError('connection refused', 'catalog-service')),
      'Failed to get cart'
    );

    await expect(pending).rejects.toBeInstanceOf(BaseError);
    await expect(pending).rejects.toMatchObject({
      message: 'Failed to get cart',
      code: ErrorCode.SERVICE_UNAVAILABLE,
      isOperational: true,
      context: { cause: 'connection refused' },
    });
  });
});

describe('isOperationalError', () => {
  it('should single out transport failures', () => {
    expect(isOperationalError(new NotFoundError('Seller'))).toBe(true);
    expect(isOperationalError(new ServiceClientError('closed', 'account-service'))).toBe(false);
    expect(isOperationalError(new Error('plain'))).toBe(false);
  });
});
