import { afterAll, afterEach, beforeAll } from 'vitest';
import { setupServer } from 'msw/node';
import { handlers } from './msw/handlers';

/**
 * MSW node server intercepting outbound HTTP for every test file.
 * Override per test with `server.use(http.get(...))`; handlers reset after
 * each test. Requests to the loopback address (the app under test) pass.
 */
export const server = setupServer(...handlers);

beforeAll(() =>
  server.listen({
    onUnhandledRequest(request, print) {
      if (new URL(request.url).hostname === '127.0.0.1') return;
      print.error();
    },
  }),
);
afterEach(() => server.resetHandlers());
afterAll(() => server.close());
