#!/usr/bin/env tsx

// CLI script for resetting one Auth user's password
import { main } from './reset-password';

main().catch((error) => {
  console.error('❌ Error:', error);
  process.exit(1);
});
