// Sample email traffic generator
// Deterministic records that exercise every signal: broadcast blasting,
// relay chains, coordinated senders sharing targets and ordinary conversation.

import type { EmailRecord } from './types';

const MINUTE = 60 * 1000;
const DEFAULT_BASE = Date.UTC(2024, 0, 15, 9, 0, 0);

function stamp(base: number, minutes: number): string {
  return new Date(base + minutes * MINUTE).toISOString();
}

function mail(
  sender: string,
  recipient: string,
  count: number,
  base: number,
  minutes: number
): EmailRecord {
  return { sender, recipient, weight: count, timestamp: stamp(base, minutes) };
}

const user = (i: number): string => `user${String(i).padStart(2, '0')}@corp.test`;

export function generateSampleData(baseTime: number = DEFAULT_BASE): EmailRecord[] {
  const records: EmailRecord[] = [];

  // ── SCENARIO 1: Broadcast blast - one sender, twelve targets, ten minutes ──
  for (let i = 0; i < 12; i++) {
    records.push(mail('deals@bulk-promo.test', user(i), 8, baseTime, i));
  }

  // ── SCENARIO 2: Relay chain - origin hides behind two intermediaries ──
  records.push(mail('origin@relay.test', 'hop1@relay.test', 40, baseTime, 30));
  records.push(mail('hop1@relay.test', 'hop2@relay.test', 40, baseTime, 31));
  for (let i = 12; i < 18; i++) {
    records.push(mail('hop2@relay.test', user(i), 6, baseTime, 32 + i));
  }

  // ── SCENARIO 3: Coordinated ring - three senders hitting the same targets ──
  for (const sender of ['alpha@campaign.test', 'beta@campaign.test', 'gamma@campaign.test']) {
    for (let i = 0; i < 5; i++) {
      records.push(mail(sender, user(i), 5, baseTime, 120 + i));
    }
  }

  // ── SCENARIO 4: Legitimate conversation spread over several days ──
  const day = 24 * 60;
  for (let d = 0; d < 5; d++) {
    records.push(mail(user(0), user(1), 1, baseTime, d * day + 15));
    records.push(mail(user(1), user(0), 1, baseTime, d * day + 45));
    records.push(mail(user(2), user(3), 1, baseTime, d * day + 300));
    records.push(mail(user(3), user(4), 1, baseTime, d * day + 420));
    records.push(mail(user(4), user(2), 1, baseTime, d * day + 600));
  }

  return records;
}
