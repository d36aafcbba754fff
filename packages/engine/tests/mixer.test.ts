import { Mixer, DEFAULT_GROUP_GAIN, DEFAULT_MASTER_GAIN, VOLUME_STEP } from '../src/mixer/mixer';
import { GROUPS } from '../src/model/groups';

describe('Mixer', () => {
  test('defaults to master 0.7 and group 0.8, nothing muted', () => {
    const mixer = new Mixer();
    expect(mixer.masterGain).toBe(DEFAULT_MASTER_GAIN);
    expect(mixer.masterMuted).toBe(false);
    for (const g of GROUPS) {
      expect(mixer.groupGain(g)).toBe(DEFAULT_GROUP_GAIN);
      expect(mixer.isGroupMuted(g)).toBe(false);
    }
  });

  test('effective gain is master times group', () => {
    const mixer = new Mixer();
    expect(mixer.effectiveGain('DRUMS')).toBe(0.7 * 0.8);
  });

  test('effective gain across a grid of settings', () => {
    const levels = [0, 0.25, 0.5, 1];
    for (const master of levels) {
      for (const group of levels) {
        const mixer = new Mixer({ masterGain: master, groupGain: group });
        expect(mixer.effectiveGain('LEAD')).toBe(master * group);
        mixer.toggleGroupMute('LEAD');
        expect(mixer.effectiveGain('LEAD')).toBe(0);
        mixer.toggleGroupMute('LEAD');
        mixer.toggleMasterMute();
        expect(mixer.effectiveGain('LEAD')).toBe(0);
      }
    }
  });

  test('volume steps land on exact hundredths', () => {
    const mixer = new Mixer();
    expect(mixer.adjustMasterVolume(VOLUME_STEP)).toBe(0.75);
    expect(mixer.adjustMasterVolume(VOLUME_STEP)).toBe(0.8);
    expect(mixer.adjustGroupVolume('BASS', -VOLUME_STEP)).toBe(0.75);
  });

  test('volumes clamp to [0, 1]', () => {
    const mixer = new Mixer();
    for (let i = 0; i < 30; i++) mixer.adjustMasterVolume(VOLUME_STEP);
    expect(mixer.masterGain).toBe(1);
    for (let i = 0; i < 30; i++) mixer.adjustGroupVolume('VOCAL', -VOLUME_STEP);
    expect(mixer.groupGain('VOCAL')).toBe(0);
    mixer.setMasterVolume(Number.NaN);
    expect(mixer.masterGain).toBe(0);
  });

  test('unmuting restores the previous gain', () => {
    const mixer = new Mixer();
    expect(mixer.toggleGroupMute('DRUMS')).toBe(true);
    expect(mixer.effectiveGain('DRUMS')).toBe(0);
    expect(mixer.effectiveGain('BASS')).toBe(0.7 * 0.8);
    expect(mixer.toggleGroupMute('DRUMS')).toBe(false);
    expect(mixer.effectiveGain('DRUMS')).toBe(0.7 * 0.8);
  });

  test('snapshot is a copy', () => {
    const mixer = new Mixer();
    const snap = mixer.snapshot();
    snap.master.gain = 0.1;
    snap.groups.DRUMS.muted = true;
    expect(mixer.masterGain).toBe(0.7);
    expect(mixer.isGroupMuted('DRUMS')).toBe(false);
    expect(mixer.snapshot().groups.BASS).toEqual({ gain: 0.8, muted: false });
  });
});
