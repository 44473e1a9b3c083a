import { MongoClient, MongoNetworkError } from 'mongodb';
import { LazyMongoClient } from '../internal/mongodb.client';

const URI = 'mongodb://127.0.0.1:27017';

function deferred<T>(): {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (reason: Error) => void;
} {
  let resolve: (value: T) => void = () => undefined;
  let reject: (reason: Error) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

describe('LazyMongoClient', () => {
  let close: jest.SpyInstance;

  beforeEach(() => {
    close = jest
      .spyOn(MongoClient.prototype, 'close')
      .mockResolvedValue(undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('shares one connect between concurrent callers', async () => {
    const connect = jest
      .spyOn(MongoClient.prototype, 'connect')
      .mockResolvedValue(new MongoClient(URI));
    const lazy = new LazyMongoClient(URI, {});

    const [a, b] = await Promise.all([lazy.getClient(), lazy.getClient()]);
    expect(a).toBe(b);
    expect(connect).toHaveBeenCalledTimes(1);
  });

  it('closes a client whose connect was still in flight', async () => {
    const gate = deferred<MongoClient>();
    jest.spyOn(MongoClient.prototype, 'connect').mockReturnValue(gate.promise);
    const lazy = new LazyMongoClient(URI, {});

    const connecting = lazy.getClient();
    const closing = lazy.close();
    gate.resolve(new MongoClient(URI));

    await connecting;
    await closing;
    expect(close).toHaveBeenCalledTimes(1);

    await lazy.close();
    expect(close).toHaveBeenCalledTimes(1);
  });

  it('closes cleanly after a failed connect and retries on next use', async () => {
    const gate = deferred<MongoClient>();
    const connect = jest
      .spyOn(MongoClient.prototype, 'connect')
      .mockReturnValueOnce(gate.promise);
    const lazy = new LazyMongoClient(URI, {});

    const connecting = lazy.getClient();
    const closing = lazy.close();
    gate.reject(new MongoNetworkError('connect ECONNREFUSED'));

    await expect(connecting).rejects.toBeInstanceOf(MongoNetworkError);
    await expect(closing).resolves.toBeUndefined();
    expect(close).not.toHaveBeenCalled();

    connect.mockResolvedValueOnce(new MongoClient(URI));
    await lazy.getClient();
    expect(connect).toHaveBeenCalledTimes(2);
  });
});
