import path from 'path'
import { fileURLToPath } from 'url'
import dotenv from 'dotenv'

const here = path.dirname(fileURLToPath(import.meta.url));

export default function dotenvConfig() {
  // .env.local wins over .env; neither overrides the real environment
  dotenv.config({ path: path.resolve(here, '../../.env.local') });
  dotenv.config({ path: path.resolve(here, '../../.env') });
}
