import { reconcile } from '../../../src/reconcile/reconciler.js';
import type { AvailabilityMap, Catalog, ManagerId } from '../../../src/types/manager.js';
import type { Command } from '../../../src/types/command.js';
import { FakeExecutor, probes } from '../../helpers/fake-executor.js';

const NONE: AvailabilityMap = {
  apt: false, yum_dnf: false, portage: false, pacman: false, flatpak: false, snap: false, xbps: false,
};

function catalogOf(entries: [ManagerId, string[]][]): Catalog {
  return new Map<ManagerId, readonly string[]>(entries);
}

/** An apt/pacman host whose installs succeed and stick, except for packages named in `broken`. */
function hostWith(installed: string[], broken: string[] = []): FakeExecutor {
  const present = new Set(installed);
  const check = (pkg: string) => () => ({ exitCode: present.has(pkg) ? 0 : 1 });
  const install = (pkg: string) => () => {
    if (broken.includes(pkg)) return { exitCode: 100 };
    present.add(pkg);
    return { exitCode: 0 };
  };
  const executor = new FakeExecutor(probes('apt', 'pacman'));
  for (const pkg of ['curl', 'vim', 'git', 'htop']) {
    executor
      .on(`dpkg -s ${pkg}`, check(pkg))
      .on(`sudo -n DEBIAN_FRONTEND=noninteractive apt install -y ${pkg}`, install(pkg))
      .on(`pacman -Q ${pkg}`, check(pkg))
      .on(`sudo -n pacman -S --noconfirm ${pkg}`, install(pkg));
  }
  return executor;
}

describe('reconcile', () => {
  it('skips managers that are unavailable here and checks the rest', async () => {
    const executor = hostWith(['curl']);
    const report = await reconcile(executor, catalogOf([['apt', ['curl', 'vim']], ['snap', ['hello']]]), {
      elevation: 'sudo',
      availability: { ...NONE, apt: true, snap: false },
    });

    expect(report.skipped).toEqual(['snap']);
    const all = [...report.alreadyInstalled, ...report.newlyInstalled, ...report.failed];
    expect(all.some((e) => e.manager === 'snap')).toBe(false);
    expect(executor.commandLines.filter((c) => c.startsWith('dpkg -s'))).toEqual(['dpkg -s curl', 'dpkg -s vim']);
  });

  it('installs only what is missing', async () => {
    const report = await reconcile(hostWith(['curl']), catalogOf([['apt', ['curl', 'vim']]]), {
      elevation: 'sudo',
      availability: { ...NONE, apt: true },
    });

    expect(report.alreadyInstalled).toEqual([{ package: 'curl', manager: 'apt' }]);
    expect(report.newlyInstalled).toEqual([{ package: 'vim', manager: 'apt' }]);
    expect(report.failed).toEqual([]);
    expect(report.dryRun).toBe(false);
  });

  it('records failures and keeps going', async () => {
    const executor = hostWith([], ['vim']);
    const report = await reconcile(executor, catalogOf([['pacman', ['vim', 'git']]]), {
      elevation: 'sudo',
      availability: { ...NONE, pacman: true },
    });

    expect(report.failed).toEqual([{ package: 'vim', manager: 'pacman', reason: 'exit code 100' }]);
    expect(report.newlyInstalled).toEqual([{ package: 'git', manager: 'pacman' }]);
    expect(executor.commandLines).toEqual([
      'pacman -Q vim', 'sudo -n pacman -S --noconfirm vim',
      'pacman -Q git', 'sudo -n pacman -S --noconfirm git',
    ]);
  });

  it('puts every checked pair in exactly one outcome', async () => {
    const catalog = catalogOf([
      ['apt', ['curl', 'vim', 'git']],
      ['flatpak', ['org.gimp.GIMP']],
      ['pacman', ['htop', 'vim']],
    ]);
    const report = await reconcile(hostWith(['git', 'htop'], ['vim']), catalog, {
      elevation: 'sudo',
      availability: { ...NONE, apt: true, pacman: true },
    });

    const outcomes = [...report.alreadyInstalled, ...report.newlyInstalled, ...report.failed];
    expect(outcomes).toHaveLength(5);
    expect(new Set(outcomes.map((e) => `${e.manager}:${e.package}`)).size).toBe(5);
    expect(report.skipped).toEqual(['flatpak']);
  });

  it('is idempotent: a second run finds everything it installed', async () => {
    const executor = hostWith([]);
    const catalog = catalogOf([['apt', ['curl', 'vim']], ['pacman', ['git']]]);
    const options = { elevation: 'sudo' as const, availability: { ...NONE, apt: true, pacman: true } };

    const first = await reconcile(executor, catalog, options);
    const second = await reconcile(executor, catalog, options);

    expect(first.newlyInstalled).toHaveLength(3);
    expect(second.newlyInstalled).toEqual([]);
    expect(second.alreadyInstalled).toEqual(first.newlyInstalled);
  });

  it('detects managers itself when no availability is given', async () => {
    const executor = hostWith(['curl']);
    const report = await reconcile(executor, catalogOf([['apt', ['curl']], ['xbps', ['xz']]]), { elevation: 'sudo' });

    expect(executor.commandLines.slice(0, 7)).toEqual([
      'apt --version', 'dnf --version', 'emerge --version', 'pacman --version',
      'flatpak --version', 'snap --version', 'xbps-query --version',
    ]);
    expect(report.alreadyInstalled).toEqual([{ package: 'curl', manager: 'apt' }]);
    expect(report.skipped).toEqual(['xbps']);
  });

  it('only checks on a dry run', async () => {
    const executor = hostWith(['curl']);
    const report = await reconcile(executor, catalogOf([['apt', ['curl', 'vim']]]), {
      elevation: 'sudo',
      availability: { ...NONE, apt: true },
      dryRun: true,
    });

    expect(report.pending).toEqual([{ package: 'vim', manager: 'apt' }]);
    expect(report.newlyInstalled).toEqual([]);
    expect(report.dryRun).toBe(true);
    expect(executor.calls.some((c: Command) => c.argv[0] === 'sudo')).toBe(false);
  });

  it('fails a package whose check and install binaries are both missing', async () => {
    const report = await reconcile(new FakeExecutor(), catalogOf([['portage', ['app-editors/vim']]]), {
      elevation: 'sudo',
      availability: { ...NONE, portage: true },
    });

    expect(report.failed).toEqual([{ package: 'app-editors/vim', manager: 'portage', reason: 'ENOENT: spawn sudo ENOENT' }]);
  });
});
