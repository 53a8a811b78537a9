import { FormPoster } from '../src/http.js';
import { PUSHOVER_ENDPOINT, PushoverNotifier } from '../src/notifier.js';

function mockLogger() {
  return { log: jest.fn(), warn: jest.fn(), error: jest.fn() };
}

const creds = { userKey: 'test-user', appToken: 'test-token', title: 'PDF Monitor' };

describe('PushoverNotifier', () => {
  it('skips sending when a credential is missing', async () => {
    const http: jest.Mocked<FormPoster> = { postForm: jest.fn() };
    const logger = mockLogger();
    const notifier = new PushoverNotifier(http, { appToken: 'test-token', title: 'PDF Monitor' }, logger);

    await notifier.notify('hello');

    expect(http.postForm).not.toHaveBeenCalled();
    expect(logger.log).toHaveBeenCalledWith('[notify] Pushover keys missing, no notification sent.');
  });

  it('posts token, user, title and message as form fields', async () => {
    const http: jest.Mocked<FormPoster> = {
      postForm: jest.fn().mockResolvedValue({ statusCode: 200, body: '{"status":1}' })
    };
    const logger = mockLogger();

    await new PushoverNotifier(http, creds, logger).notify('line one\nline two');

    expect(http.postForm).toHaveBeenCalledTimes(1);
    expect(http.postForm).toHaveBeenCalledWith(PUSHOVER_ENDPOINT, {
      token: 'test-token',
      user: 'test-user',
      title: 'PDF Monitor',
      message: 'line one\nline two'
    });
    expect(logger.log).toHaveBeenCalledWith('[notify] Pushover notification sent.');
    expect(logger.error).not.toHaveBeenCalled();
  });

  it('logs a non-200 response without throwing', async () => {
    const http: jest.Mocked<FormPoster> = {
      postForm: jest.fn().mockResolvedValue({ statusCode: 400, body: '{"status":0}' })
    };
    const logger = mockLogger();

    await expect(new PushoverNotifier(http, creds, logger).notify('hi')).resolves.toBeUndefined();
    expect(logger.error).toHaveBeenCalledWith('[notify] Pushover failed: 400 {"status":0}');
  });

  it('logs a network error without throwing', async () => {
    const http: jest.Mocked<FormPoster> = {
      postForm: jest.fn().mockRejectedValue(new Error('ETIMEDOUT'))
    };
    const logger = mockLogger();

    await expect(new PushoverNotifier(http, creds, logger).notify('hi')).resolves.toBeUndefined();
    expect(logger.error).toHaveBeenCalledWith('[notify] Pushover request failed: ETIMEDOUT');
  });
});
