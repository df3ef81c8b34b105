import { MANAGERS, getManager, probeCommand, elevate, installCommand } from '../../../src/managers/registry.js';
import { MANAGER_IDS } from '../../../src/types/manager.js';

describe('manager registry', () => {
  it('has an entry for every manager id, keyed by its own id', () => {
    for (const id of MANAGER_IDS) {
      expect(getManager(id).id).toBe(id);
    }
    expect(Object.keys(MANAGERS)).toEqual([...MANAGER_IDS]);
  });

  it('probes each binary with --version', () => {
    expect(probeCommand('apt').argv).toEqual(['apt', '--version']);
    expect(probeCommand('yum_dnf').argv).toEqual(['dnf', '--version']);
    expect(probeCommand('portage').argv).toEqual(['emerge', '--version']);
    expect(probeCommand('xbps').argv).toEqual(['xbps-query', '--version']);
  });

  it('builds the existence checks', () => {
    expect(getManager('apt').checkInstalled('curl').argv).toEqual(['dpkg', '-s', 'curl']);
    expect(getManager('yum_dnf').checkInstalled('curl').argv).toEqual(['dnf', 'list', 'installed', 'curl']);
    expect(getManager('flatpak').checkInstalled('org.gimp.GIMP').argv).toEqual(['flatpak', 'info', 'org.gimp.GIMP']);
    expect(getManager('xbps').checkInstalled('xz').argv).toEqual(['xbps-query', '-S', 'xz']);
  });
});

describe('installCommand', () => {
  it('elevates managers that need root', () => {
    expect(installCommand('pacman', 'vim', 'sudo').argv).toEqual(['sudo', '-n', 'pacman', '-S', '--noconfirm', 'vim']);
    expect(installCommand('snap', 'hello', 'sudo').argv).toEqual(['sudo', '-n', 'snap', 'install', 'hello']);
    expect(installCommand('portage', 'app-editors/vim', 'sudo').argv).toEqual(['sudo', '-n', 'emerge', 'app-editors/vim']);
    expect(installCommand('xbps', 'xz', 'sudo').argv).toEqual(['sudo', '-n', 'xbps-install', '-S', '-y', 'xz']);
  });

  it('does not elevate flatpak', () => {
    expect(installCommand('flatpak', 'org.gimp.GIMP', 'sudo').argv).toEqual(['flatpak', 'install', '-y', 'org.gimp.GIMP']);
  });

  it('passes the apt environment through sudo', () => {
    expect(installCommand('apt', 'curl', 'sudo').argv).toEqual(['sudo', '-n', 'DEBIAN_FRONTEND=noninteractive', 'apt', 'install', '-y', 'curl']);
  });

  it('uses env(1) under doas when there is an environment', () => {
    expect(installCommand('apt', 'curl', 'doas').argv).toEqual(['doas', '-n', 'env', 'DEBIAN_FRONTEND=noninteractive', 'apt', 'install', '-y', 'curl']);
    expect(installCommand('yum_dnf', 'curl', 'doas').argv).toEqual(['doas', '-n', 'dnf', 'install', '-y', 'curl']);
  });
});

describe('elevate', () => {
  it('never lets the wrapper prompt for a password', () => {
    expect(elevate({ argv: ['snap', 'install', 'hello'] }, 'sudo').argv.slice(0, 2)).toEqual(['sudo', '-n']);
    expect(elevate({ argv: ['snap', 'install', 'hello'] }, 'doas').argv.slice(0, 2)).toEqual(['doas', '-n']);
  });

  it('keeps the original env on the command', () => {
    const cmd = elevate({ argv: ['apt', 'install', '-y', 'x'], env: { A: '1' } }, 'sudo');
    expect(cmd.env).toEqual({ A: '1' });
    expect(cmd.argv).toEqual(['sudo', '-n', 'A=1', 'apt', 'install', '-y', 'x']);
  });
});
