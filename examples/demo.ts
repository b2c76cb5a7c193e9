#!/usr/bin/env npx tsx
/**
 * Air-gap frame protocol demo
 *
 * Simulates an online wallet sending a signing request to an offline signer
 * over animated QR frames, with frames scanned out of order and repeated.
 *
 * Run with: npm run demo
 */

import { AirGap, deriveInstanceKeyPair, bytesToHex } from '../src/index.js';
// Pairing is out of band; the demo derives a shared key locally
import { createSessionCipher } from '../src/crypto/index.js';

// Demo seeds (DO NOT use these in production!)
const ONLINE_SEED = '0x' + 'aa'.repeat(32);
const OFFLINE_SEED = '0x' + 'bb'.repeat(32);

const OP_SIGN_REQUEST = 0x0001;
const OP_SIGN_RESPONSE = 0x0002;

function scanOrder(count: number): number[] {
  // Camera picks up every other frame first, then the rest, with one repeat
  const order: number[] = [];
  for (let i = 0; i < count; i += 2) order.push(i);
  for (let i = 1; i < count; i += 2) order.push(i);
  order.splice(1, 0, order[0]);
  return order;
}

function main(): void {
  const online = deriveInstanceKeyPair(ONLINE_SEED);
  const offline = deriveInstanceKeyPair(OFFLINE_SEED);

  console.log('Devices paired:');
  console.log(`   Online instance id:   ${bytesToHex(online.instanceId)}`);
  console.log(`   Offline instance id:  ${bytesToHex(offline.instanceId)}`);
  console.log();

  // Both sides agree on the offline signer's id as the session instance
  const onlineSide = new AirGap({
    instanceId: offline.instanceId,
    cipher: createSessionCipher(online.privateKey, offline.instanceId),
  });
  const offlineSide = new AirGap({
    instanceId: offline.instanceId,
    cipher: createSessionCipher(offline.privateKey, online.instanceId),
  });

  const unsignedTx = new TextEncoder().encode(
    JSON.stringify({ to: 'demo-recipient', amount: '1.25', memo: 'x'.repeat(300) })
  );

  const frames = onlineSide
    .createMessage()
    .addOperation(OP_SIGN_REQUEST, unsignedTx)
    .marshalChunks();

  console.log(`Online: displaying ${frames.length} frames of ${onlineSide.getChunkSize()} bytes`);

  const receiver = offlineSide.createReceiver();
  receiver.onMessage((message) => {
    for (const op of message.operations) {
      console.log(`Offline: received op 0x${op.opCode.toString(16).padStart(4, '0')} (${op.size} bytes)`);
    }
  });

  for (const index of scanOrder(frames.length)) {
    const progress = receiver.push(frames[index]);
    const note = progress.added ? '' : ' (duplicate)';
    console.log(`Offline: scanned frame ${index}${note} -> ${progress.received}/${progress.total}`);
  }

  const reply = offlineSide
    .createMessage()
    .addOperation(OP_SIGN_RESPONSE, new Uint8Array(64).fill(0x5a))
    .marshalChunks();

  const response = onlineSide.unmarshalChunks([...reply].reverse());
  console.log();
  console.log(`Online: got ${response.operations.length} response op(s) from ${reply.length} frame(s)`);
}

try {
  main();
} catch (error) {
  console.error(`Error: ${error instanceof Error ? error.message : error}`);
  process.exitCode = 1;
}
