import { defineConfig } from 'vitest/config';

// Tests run off UTC so any read of the host's zone shows up as a failure
process.env.TZ = 'America/New_York';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    environment: 'node',
    env: { TZ: 'America/New_York' },
  },
});
