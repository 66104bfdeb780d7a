import { execFile } from 'node:child_process';
import { readdir, readFile } from 'node:fs/promises';
import { networkInterfaces } from 'node:os';
import { join } from 'node:path';
import { promisify } from 'node:util';

const execFileAsync = promisify(execFile);

/**
 * Gate evaluated before a job fires. Conditions run in order and stop at
 * the first false; a condition that throws counts as false.
 */
export type JobCondition = () => boolean | Promise<boolean>;

/**
 * Host facts the built-in conditions read.
 */
export interface EnvironmentProbe {
  vpnConnected(): Promise<boolean>;
  onAcPower(): Promise<boolean>;
  screenLocked(): Promise<boolean>;
}

function named(name: string, condition: JobCondition): JobCondition {
  Object.defineProperty(condition, 'name', { value: name });
  return condition;
}

export function vpnConnected(probe: EnvironmentProbe): JobCondition {
  return named('vpnConnected', () => probe.vpnConnected());
}

export function acPowerConnected(probe: EnvironmentProbe): JobCondition {
  return named('acPowerConnected', () => probe.onAcPower());
}

export function screenLocked(probe: EnvironmentProbe): JobCondition {
  return named('screenLocked', () => probe.screenLocked());
}

export function not(condition: JobCondition): JobCondition {
  return named(`not(${condition.name})`, async () => !(await condition()));
}

/** Short-circuit AND, usable wherever a single condition is expected */
export function all(...conditions: JobCondition[]): JobCondition {
  return named(`all(${conditions.map(c => c.name).join(', ')})`, async () => {
    for (const condition of conditions) {
      if (!(await condition())) return false;
    }
    return true;
  });
}

export interface SystemEnvironmentProbeOptions {
  /** Interface names counted as VPN tunnels */
  vpnInterfacePattern?: RegExp;
  powerSupplyDir?: string;
  /** Session whose lock state is read; defaults to XDG_SESSION_ID */
  sessionId?: string;
}

/**
 * Reads the local machine: network interfaces, /sys/class/power_supply and loginctl.
 */
export class SystemEnvironmentProbe implements EnvironmentProbe {
  private readonly vpnPattern: RegExp;
  private readonly powerSupplyDir: string;
  private readonly sessionId?: string;

  constructor(options: SystemEnvironmentProbeOptions = {}) {
    this.vpnPattern = options.vpnInterfacePattern ?? /^(tun|tap|wg|ppp|utun|ipsec)\d*/;
    this.powerSupplyDir = options.powerSupplyDir ?? '/sys/class/power_supply';
    this.sessionId = options.sessionId ?? process.env.XDG_SESSION_ID;
  }

  async vpnConnected(): Promise<boolean> {
    return Object.entries(networkInterfaces()).some(
      ([name, addresses]) => this.vpnPattern.test(name) && (addresses ?? []).some(a => !a.internal)
    );
  }

  /**
   * True when a mains supply reports online, or when the machine has no
   * power supply information at all.
   */
  async onAcPower(): Promise<boolean> {
    let supplies: string[];
    try {
      supplies = await readdir(this.powerSupplyDir);
    } catch (err) {
      if (isMissing(err)) return true;
      throw err;
    }

    let sawMains = false;
    for (const supply of supplies) {
      const dir = join(this.powerSupplyDir, supply);
      const type = await readTrimmed(join(dir, 'type'));
      if (type !== 'Mains') continue;
      sawMains = true;
      if ((await readTrimmed(join(dir, 'online'))) === '1') return true;
    }
    return !sawMains;
  }

  async screenLocked(): Promise<boolean> {
    const args = this.sessionId
      ? ['show-session', this.sessionId, '-p', 'LockedHint', '--value']
      : ['show-session', '-p', 'LockedHint', '--value'];
    const { stdout } = await execFileAsync('loginctl', args);
    return stdout.trim() === 'yes';
  }
}

function isMissing(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

async function readTrimmed(path: string): Promise<string | null> {
  try {
    return (await readFile(path, 'utf8')).trim();
  } catch (err) {
    if (isMissing(err)) return null;
    throw err;
  }
}
