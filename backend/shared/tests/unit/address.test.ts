import { ConfigurationError, addressFromEnv, formatAddress, parseAddress } from '../../src';

describe('parseAddress', () => {
  it('should split host and port', () => {
    expect(parseAddress('127.0.0.1:8081')).toEqual({ host: '127.0.0.1', port: 8081 });
    expect(parseAddress('catalog.internal:9000')).toEqual({ host: 'catalog.internal', port: 9000 });
  });

  it('should accept bracketed IPv6 hosts', () => {
    expect(parseAddress('[::1]:8083')).toEqual({ host: '::1', port: 8083 });
  });

  it('should reject values without a port', () => {
    expect(() => parseAddress('localhost')).toThrow(ConfigurationError);
    expect(() => parseAddress('localhost')).toThrow('Invalid address "localhost", expected host:port');
  });

  it('should reject out-of-range ports', () => {
    expect(() => parseAddress('localhost:70000')).toThrow('Invalid port in address "localhost:70000"');
  });
});

describe('formatAddress', () => {
  it('should bracket IPv6 hosts', () => {
    expect(formatAddress({ host: '::1', port: 8083 })).toBe('[::1]:8083');
    expect(formatAddress({ host: '127.0.0.1', port: 8081 })).toBe('127.0.0.1:8081');
  });
});

describe('addressFromEnv', () => {
  afterEach(() => {
    delete process.env.TEST_SERVICE_ADDR;
  });

  it('should prefer the environment variable', () => {
    process.env.TEST_SERVICE_ADDR = '10.0.0.5:7000';

    expect(addressFromEnv('TEST_SERVICE_ADDR', '127.0.0.1:8081')).toEqual({ host: '10.0.0.5', port: 7000 });
  });

  it('should fall back when the variable is unset or empty', () => {
    expect(addressFromEnv('TEST_SERVICE_ADDR', '127.0.0.1:8081')).toEqual({ host: '127.0.0.1', port: 8081 });

    process.env.TEST_SERVICE_ADDR = '';
    expect(addressFromEnv('TEST_SERVICE_ADDR', '127.0.0.1:8081')).toEqual({ host: '127.0.0.1', port: 8081 });
  });
});
