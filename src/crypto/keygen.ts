#!/usr/bin/env node

import { generateKeyPair, saveKeyPair, loadKeyPair, PRIVATE_KEY_FILE, PUBLIC_KEY_FILE } from './signer.js';
import { join, resolve } from 'path';
import { homedir } from 'os';

const DEFAULT_KEY_DIR = resolve(homedir(), '.policyguard', 'keys');

async function main() {
  const keyDir = process.argv[2] || DEFAULT_KEY_DIR;

  console.log('policyguard audit key generator');
  console.log('─'.repeat(40));
  console.log(`Key directory: ${keyDir}`);

  // Check for existing keys
  const existing = loadKeyPair(keyDir);
  if (existing) {
    console.log('\n⚠️  Keys already exist at this location.');
    console.log('   Existing audit records were signed with them; regenerating breaks verification.');
    console.log(`   To regenerate anyway, delete ${keyDir} first.`);
    process.exit(1);
  }

  console.log('\nGenerating Ed25519 key pair...');
  const keyPair = generateKeyPair();

  saveKeyPair(keyDir, keyPair);

  console.log('\n✓ Keys generated:');
  console.log(`  Private key: ${join(keyDir, PRIVATE_KEY_FILE)} (mode 600)`);
  console.log(`  Public key:  ${join(keyDir, PUBLIC_KEY_FILE)} (mode 644)`);

  console.log('\n⚠️  Keep the private key out of version control. The public key is enough to verify the audit log.');
}

main().catch(console.error);
