import { signRequest } from '../src/auth.js';
import { loadConfig } from '../src/config.js';

/**
 * Print signing headers for a request against the media API.
 *
 * Usage:
 *   npm run sign-request -- GET '/image/photos/cat.jpg?operations=resize,w_800'
 */
function main() {
  const [method = 'GET', url] = process.argv.slice(2);
  const { sharedSecret } = loadConfig();
  if (!url) {
    console.error('Usage: sign-request <METHOD> <path?query>');
    process.exit(1);
  }
  if (!sharedSecret) {
    console.error('PROCESSOR_SHARED_SECRET is not set; requests are accepted unsigned.');
    process.exit(1);
  }

  const timestamp = Date.now();
  console.log(`X-Timestamp: ${timestamp}`);
  console.log(`X-Signature: ${signRequest(sharedSecret, timestamp, method, url)}`);
}

main();
