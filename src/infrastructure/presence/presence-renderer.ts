import type { DisplayState } from '../../domain/splits/milestones.js';
import { COMPLETE, SPLIT_COUNT, rankOf } from '../../domain/splits/milestones.js';
import type { RunSnapshot } from '../../domain/splits/run-state-machine.js';

/**
 * Everything a presence sink needs to draw one status card.
 * Image keys refer to art assets uploaded to the Discord application.
 */
export interface PresenceView {
  readonly state: string;
  readonly details: string;
  readonly largeImageKey: string;
  readonly largeImageText: string;
  readonly smallImageKey: string;
  readonly smallImageText: string;
  /** Wall-clock start of the run, for the elapsed counter. */
  readonly startTimestampMs: number;
}

interface StateInfo {
  readonly state: string;
  readonly details: string;
  readonly largeImage: readonly [key: string, text: string];
  readonly smallImage: readonly [key: string, text: string];
}

const NETHER_IMAGE = ['nether', 'The Nether'] as const;

const INFO: Readonly<Record<DisplayState, StateInfo>> = {
  none: {
    state: 'Starting a new run',
    details: 'Grinding the overworld...',
    largeImage: ['overworld', 'Overworld'],
    smallImage: ['grass_block', 'Just started'],
  },
  nether: {
    state: 'Entered the Nether',
    details: 'Trading piglins / looting bastion...',
    largeImage: NETHER_IMAGE,
    smallImage: ['nether_portal', 'Nether entered'],
  },
  bastion: {
    state: 'In Bastion Remnant',
    details: 'Looting gold & ender pearls...',
    largeImage: NETHER_IMAGE,
    smallImage: ['bastion', 'Bastion found'],
  },
  fortress: {
    state: 'In Nether Fortress',
    details: 'Collecting blaze rods...',
    largeImage: NETHER_IMAGE,
    smallImage: ['fortress', 'Fortress found'],
  },
  first_portal: {
    state: 'Built First Portal',
    details: 'Returning to the overworld...',
    largeImage: NETHER_IMAGE,
    smallImage: ['obsidian', 'Portal constructed'],
  },
  stronghold_search: {
    state: 'Locating Stronghold',
    details: 'Throwing eyes of ender...',
    largeImage: ['stronghold', 'Searching for Stronghold'],
    smallImage: ['ender_eye', 'Stronghold phase'],
  },
  stronghold: {
    state: 'In the Stronghold',
    details: 'Looking for the portal room...',
    largeImage: ['stronghold', 'Stronghold'],
    smallImage: ['end_portal_frame', 'Stronghold found'],
  },
  end: {
    state: 'Entered the End',
    details: 'Fighting the Ender Dragon!',
    largeImage: ['end', 'The End'],
    smallImage: ['end_portal', 'End portal entered'],
  },
  finish: {
    state: 'Run Complete!',
    details: 'Dragon has been slain!',
    largeImage: ['credits', 'Finished!'],
    smallImage: ['dragon_egg', 'Run finished'],
  },
};

/** In-game time as `m:ss.mmm`; non-positive values read `0:00.000`. */
export function formatIgt(ms: number): string {
  if (!(ms > 0)) return '0:00.000';
  const whole = Math.floor(ms);
  const millis = whole % 1_000;
  const totalSeconds = Math.floor(whole / 1_000);
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  return `${minutes}:${String(seconds).padStart(2, '0')}.${String(millis).padStart(3, '0')}`;
}

export function renderPresence(snapshot: RunSnapshot): PresenceView {
  const info = INFO[snapshot.display];
  const igtKnown = snapshot.elapsedMs > 0;

  const state =
    snapshot.milestone === COMPLETE
      ? `FINISHED! IGT: ${formatIgt(snapshot.elapsedMs)}`
      : `${info.state} (${rankOf(snapshot.milestone)}/${SPLIT_COUNT} splits)`;

  return {
    state,
    details: igtKnown ? `${info.details} | IGT: ${formatIgt(snapshot.elapsedMs)}` : info.details,
    largeImageKey: info.largeImage[0],
    largeImageText: info.largeImage[1],
    smallImageKey: info.smallImage[0],
    smallImageText: info.smallImage[1],
    startTimestampMs: snapshot.runEpochStartMs,
  };
}

export function sameView(a: PresenceView, b: PresenceView): boolean {
  return (
    a.state === b.state &&
    a.details === b.details &&
    a.largeImageKey === b.largeImageKey &&
    a.largeImageText === b.largeImageText &&
    a.smallImageKey === b.smallImageKey &&
    a.smallImageText === b.smallImageText &&
    a.startTimestampMs === b.startTimestampMs
  );
}
