import type { Milestone } from './milestones.js';

/**
 * Every raw split name a record file may use, mapped onto its milestone.
 * Names not listed here are dropped by the snapshot reader.
 */
const ALIASES: ReadonlyArray<readonly [Milestone, readonly string[]]> = [
  ['nether', ['nether', 'enter_nether', 'enterNether']],
  ['bastion', ['bastion', 'enter_bastion', 'enterBastion']],
  ['fortress', ['fortress', 'enter_fortress', 'enterFortress']],
  ['first_portal', ['first_portal', 'firstPortal', 'nether_travel', 'netherTravel']],
  ['stronghold', ['stronghold', 'enter_stronghold', 'enterStronghold']],
  ['end', ['end', 'enter_end', 'enterEnd']],
  ['finish', ['finish', 'kill_ender_dragon', 'killEnderDragon']],
];

const BY_ALIAS: ReadonlyMap<string, Milestone> = new Map(
  ALIASES.flatMap(([milestone, names]) => names.map((name): [string, Milestone] => [name.toLowerCase(), milestone])),
);

/** Case-insensitive. Returns null for names with no milestone. */
export function canonicalMilestone(rawName: string): Milestone | null {
  return BY_ALIAS.get(rawName.trim().toLowerCase()) ?? null;
}
