import { test, expect } from "@playwright/test";

import { AudioDeviceError } from "../../src/engine/errors";
import { LevelSmoother } from "../../src/engine/internal/levelSmoother";
import { LoudnessSampler, computeRms } from "../../src/engine/internal/loudnessSampler";
import { SampleChannel } from "../../src/engine/internal/sampleChannel";
import { MockAudioSource } from "../../src/main/testing/mockAudioSource";

test("rms: empty buffer yields nothing", () => {
  expect(computeRms([])).toBeNull();
  expect(computeRms(new Float32Array(0))).toBeNull();
});

test("rms: adds a small epsilon so silence is never exactly zero", () => {
  expect(computeRms([0, 0, 0])).toBe(1e-6);
  expect(computeRms([0.5, -0.5])).toBeCloseTo(0.500001, 9);
});

test("rms: non-finite samples count as silence", () => {
  expect(computeRms([Number.NaN, 0.5, Number.POSITIVE_INFINITY, -0.5])).toBeCloseTo(
    Math.sqrt(0.5 / 4) + 1e-6,
    9
  );
});

test("sample channel: overwrites the oldest value when full, drains the newest", () => {
  const channel = new SampleChannel(3);
  [1, 2, 3, 4, 5].forEach((v) => channel.publish(v));
  expect(channel.pending).toBe(3);
  expect(channel.drainLatest()).toBe(5);
  expect(channel.pending).toBe(0);
  expect(channel.drainLatest()).toBeUndefined();
  channel.publish(7);
  expect(channel.drainLatest()).toBe(7);
});

test("sample channel: defaults to a capacity of 8", () => {
  expect(new SampleChannel().capacity).toBe(8);
  expect(new SampleChannel(0).capacity).toBe(1);
});

test("sampler: read returns the latest loudness, then 0 when nothing new arrived", () => {
  const source = new MockAudioSource();
  const sampler = new LoudnessSampler(source);
  source.emitFrames([0.1, -0.1]);
  source.emitFrames([0.4, -0.4]);
  expect(sampler.read()).toBeCloseTo(0.400001, 6);
  expect(sampler.read()).toBe(0);
});

test("sampler: empty buffers are skipped", () => {
  const source = new MockAudioSource();
  const sampler = new LoudnessSampler(source);
  source.emitFrames([0.3, -0.3]);
  source.emitFrames([]);
  expect(sampler.read()).toBeCloseTo(0.300001, 6);
});

test("sampler: open failure surfaces as AudioDeviceError", () => {
  const source = new MockAudioSource({ openError: new Error("no microphone") });
  let caught: unknown = null;
  try {
    new LoudnessSampler(source);
  } catch (error) {
    caught = error;
  }
  expect(caught).toBeInstanceOf(AudioDeviceError);
  expect(caught instanceof Error ? caught.message : "").toBe(
    "Failed to open audio input stream: no microphone"
  );
});

test("sampler: a stream fault is rethrown on the next read", () => {
  const source = new MockAudioSource();
  const sampler = new LoudnessSampler(source);
  source.emitFault(new Error("device unplugged"));
  source.emitFault(new Error("second fault"));
  expect(() => sampler.read()).toThrow("device unplugged");
});

test("sampler: stop and close reach the stream once each", () => {
  const source = new MockAudioSource();
  const sampler = new LoudnessSampler(source);
  sampler.stop();
  sampler.stop();
  sampler.close();
  sampler.close();
  expect(source.stopCalls).toBe(1);
  expect(source.closeCalls).toBe(1);
  source.emitFrames([0.9]);
  expect(sampler.read()).toBe(0);
});

test("smoother: 0.7 of the previous level plus 0.3 of the new one", () => {
  const smoother = new LevelSmoother();
  expect(smoother.update(1)).toBeCloseTo(0.3, 12);
  expect(smoother.update(1)).toBeCloseTo(0.51, 12);
  expect(smoother.update(0)).toBeCloseTo(0.357, 12);
});

test("smoother: stays between the previous level and the raw sample, never negative", () => {
  const smoother = new LevelSmoother(0.2);
  const raws = [0.05, 0.9, 0, 0.33, 0.33, 1e-6, 0.6];
  for (const raw of raws) {
    const prev = smoother.value;
    const next = smoother.update(raw);
    expect(next).toBeGreaterThanOrEqual(Math.min(prev, raw) - 1e-12);
    expect(next).toBeLessThanOrEqual(Math.max(prev, raw) + 1e-12);
  }
  expect(smoother.update(-4)).toBeGreaterThanOrEqual(0);
  expect(smoother.update(Number.NaN)).toBeGreaterThanOrEqual(0);
});

test("smoother: reset returns to silence", () => {
  const smoother = new LevelSmoother(0.5);
  smoother.reset();
  expect(smoother.value).toBe(0);
});
