import { Light } from '../../../src/domain/devices/Light';
import { FakeLogger } from '../../helpers/FakeLogger';

describe('Light', () => {
  test('starts off', () => {
    const light = new Light({ logger: new FakeLogger() });
    expect(light.isOn()).toBe(false);
    expect(light.isActive()).toBe(false);
  });

  test('activate then deactivate returns to off and announces each step', () => {
    const logger = new FakeLogger();
    const light = new Light({ logger });

    light.activate();
    expect(light.isOn()).toBe(true);

    light.deactivate();
    expect(light.isOn()).toBe(false);

    expect(logger.messages()).toEqual(['Light is ON', 'Light is OFF']);
  });

  test('writes notifications through the console logger by default', () => {
    const infoSpy = jest.spyOn(console, 'info').mockImplementation(() => {});
    try {
      new Light().activate();
      expect(infoSpy).toHaveBeenCalledWith('Light is ON');
    } finally {
      infoSpy.mockRestore();
    }
  });

  test('snapshot is frozen and tagged', () => {
    const light = new Light({ logger: new FakeLogger() });
    light.activate();
    const snap = light.snapshot();
    expect(snap).toEqual({ kind: 'light', on: true });
    expect(Object.isFrozen(snap)).toBe(true);
  });

  test('clone copies state without aliasing', () => {
    const light = new Light({ logger: new FakeLogger() });
    light.activate();
    const copy = light.clone();

    light.deactivate();

    expect(copy.isOn()).toBe(true);
    expect(light.isOn()).toBe(false);
  });
});
