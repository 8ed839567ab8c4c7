import { test, expect } from "@playwright/test";

import { TalkStateMachine } from "../../src/engine/internal/talkStateMachine";

test("talk state: release threshold is 70% of the talk threshold", () => {
  const machine = new TalkStateMachine({ threshold: 0.03, now: 0 });
  expect(machine.releaseThreshold).toBeCloseTo(0.021, 12);
});

test("talk state: starts only strictly above the threshold", () => {
  const machine = new TalkStateMachine({ threshold: 0.03, now: 0 });
  expect(machine.evaluate(0.03, 100)).toBeNull();
  expect(machine.isTalking).toBe(false);
  expect(machine.evaluate(0.031, 200)).toBe("started");
  expect(machine.isTalking).toBe(true);
});

test("talk state: levels between release and talk thresholds keep the current state", () => {
  const machine = new TalkStateMachine({ threshold: 0.03, now: 0 });
  expect(machine.evaluate(0.025, 100)).toBeNull();
  expect(machine.isTalking).toBe(false);

  expect(machine.evaluate(0.04, 200)).toBe("started");
  expect(machine.evaluate(0.025, 300)).toBeNull();
  expect(machine.evaluate(0.021, 400)).toBeNull();
  expect(machine.isTalking).toBe(true);
  expect(machine.evaluate(0.02, 500)).toBe("stopped");
  expect(machine.isTalking).toBe(false);
});

test("talk state: smoothed level sequence sampled every 100ms", () => {
  const machine = new TalkStateMachine({ threshold: 0.03, now: 0 });
  const levels = [0.0, 0.01, 0.04, 0.04, 0.02, 0.018];
  const states = levels.map((level, i) => {
    machine.evaluate(level, i * 100);
    return machine.isTalking ? "Talking" : "Idle";
  });
  expect(states).toEqual(["Idle", "Idle", "Talking", "Talking", "Idle", "Idle"]);
});

test("talk state: no two transitions within 50ms", () => {
  const machine = new TalkStateMachine({ threshold: 0.03, now: 0 });
  expect(machine.evaluate(0.5, 50)).toBeNull();
  expect(machine.evaluate(0.5, 51)).toBe("started");
  expect(machine.evaluate(0, 71)).toBeNull();
  expect(machine.evaluate(0, 101)).toBeNull();
  expect(machine.evaluate(0, 102)).toBe("stopped");
  expect(machine.lastTransitionTime).toBe(102);
});

test("talk state: threshold changes take effect on the next evaluation", () => {
  const machine = new TalkStateMachine({ threshold: 0.03, now: 0 });
  machine.setThreshold(0.1);
  expect(machine.evaluate(0.06, 100)).toBeNull();
  expect(machine.evaluate(0.11, 200)).toBe("started");
  expect(machine.releaseThreshold).toBeCloseTo(0.07, 12);
});

test("talk state: restored talking state releases normally", () => {
  const machine = new TalkStateMachine({ threshold: 0.03, now: 0, talking: true });
  expect(machine.isTalking).toBe(true);
  expect(machine.evaluate(0.001, 60)).toBe("stopped");
  machine.reset(1000);
  expect(machine.isTalking).toBe(false);
  expect(machine.lastTransitionTime).toBe(1000);
});
