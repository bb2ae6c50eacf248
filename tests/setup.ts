import { setVerbose } from '../src/lib/logger';
import { resetConfig } from '../src/lib/config';

// Plain output so tests can assert exact messages
process.env.NO_COLOR = '1';

const CONFIG_ENV_VARS = [
  'POST_THUMBS_URL',
  'POST_THUMBS_API_KEY',
  'POST_THUMBS_POST_TYPE',
  'POST_THUMBS_BATCH_SIZE',
  'POST_THUMBS_ATTACHMENT_LIMIT',
  'POST_THUMBS_USE_MOCK',
  'POST_THUMBS_MOCK_DATA',
  'POST_THUMBS_VERBOSE',
];

beforeEach(() => {
  for (const name of CONFIG_ENV_VARS) {
    delete process.env[name];
  }
  resetConfig();
  setVerbose(false);
});
