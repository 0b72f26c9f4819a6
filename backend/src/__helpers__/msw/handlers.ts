import { http, HttpResponse } from 'msw';

/**
 * Google endpoints are blocked unless a test mocks them with
 * `server.use(...)`, so nothing in the suite reaches the network.
 */
export const externalApiGuards = [
  http.all('https://maps.googleapis.com/*', () =>
    HttpResponse.json(
      { error: 'Places API is not mocked for this test.' },
      { status: 500 },
    ),
  ),
  http.all('https://mybusiness.googleapis.com/*', () =>
    HttpResponse.json(
      { error: 'Business Profile API is not mocked for this test.' },
      { status: 500 },
    ),
  ),
  http.all('https://www.googleapis.com/*', () =>
    HttpResponse.json(
      { error: 'Google OAuth is not mocked for this test.' },
      { status: 500 },
    ),
  ),
  http.all('https://oauth2.googleapis.com/*', () =>
    HttpResponse.json(
      { error: 'Google OAuth is not mocked for this test.' },
      { status: 500 },
    ),
  ),
];

export const handlers = [...externalApiGuards];
