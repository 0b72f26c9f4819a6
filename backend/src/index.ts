import dotenv from 'dotenv';
import { createApp } from './app';
import { connectBusinessProfile } from './businessProfile/businessProfileApi';
import { loadConfig } from './config/config';
import { loadCredentials } from './credentials/credentialLoader';
import { createLogger } from './logger';
import { PlacesApiSource } from './places/placesApiSource';
import { signatureFor } from './replies/replyComposer';
import { FlowController } from './session/flowController';
import { createSession } from './session/session';

dotenv.config();

const log = createLogger('server');
const config = loadConfig();
const credentials = loadCredentials(config.secrets);
credentials.warnings.unshift(...config.warnings);

for (const warning of credentials.warnings) {
  log.warn(warning);
}
log.info('Places API key present:', Boolean(credentials.apiKey));
log.info(
  'Business Profile Service Account present:',
  Boolean(credentials.serviceAccount),
);

const flow = new FlowController(createSession(credentials), {
  createPlacesSource: (apiKey) =>
    new PlacesApiSource({ apiKey, timeoutMs: config.requestTimeoutMs }),
  connect: (credential) =>
    connectBusinessProfile(credential, config.requestTimeoutMs),
  signature: signatureFor(config.businessName),
});

const app = createApp(flow);

app.listen(config.port, () => {
  log.info(`Backend listening on port ${config.port}`);
});
