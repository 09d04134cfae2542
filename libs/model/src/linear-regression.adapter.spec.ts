import { FEATURE_NAMES, FeatureRecord } from './feature-record.interface';
import { LinearRegressionAdapter } from './linear-regression.adapter';
import { parseModelArtifact } from './model-artifact';

const record: FeatureRecord = {
  GRE_Score: 300,
  TOEFL_Score: 100,
  University_Rating: 3,
  SOP: 3,
  LOR: 4,
  CGPA: 8,
  Research: 1,
};

const COEFFICIENTS = [0.001, 0.002, 0, 0, 0, 0.1, 0.05];

function adapterFor(overrides: Record<string, unknown> = {}): LinearRegressionAdapter {
  const artifact = parseModelArtifact(
    {
      name: 'test-model',
      version: '0.0.1',
      features: [...FEATURE_NAMES],
      coefficients: COEFFICIENTS,
      intercept: -0.5,
      ...overrides,
    },
    'inline',
  );
  return new LinearRegressionAdapter(artifact);
}

describe('LinearRegressionAdapter', () => {
  it('adds the intercept to the weighted sum of features', async () => {
    // 0.3 + 0.2 + 0.8 + 0.05 - 0.5
    await expect(adapterFor().run(record)).resolves.toBeCloseTo(0.85, 10);
  });

  it('pairs coefficients with features by the artifact order', async () => {
    const adapter = adapterFor({
      features: [...FEATURE_NAMES].reverse(),
      coefficients: [...COEFFICIENTS].reverse(),
    });

    await expect(adapter.run(record)).resolves.toBeCloseTo(0.85, 10);
  });

  it('standardizes features when the artifact has a scaler', async () => {
    const centred = adapterFor({
      scaler: {
        mean: [300, 100, 3, 3, 4, 8, 1],
        scale: [1, 1, 1, 1, 1, 1, 1],
      },
    });
    const halved = adapterFor({
      scaler: {
        mean: [0, 0, 0, 0, 0, 0, 0],
        scale: [2, 2, 2, 2, 2, 2, 2],
      },
    });

    await expect(centred.run(record)).resolves.toBe(-0.5);
    await expect(halved.run(record)).resolves.toBeCloseTo(0.175, 10);
  });

  it('does not return a value once the signal has aborted', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(
      adapterFor().run(record, controller.signal),
    ).rejects.toMatchObject({ name: 'AbortError' });
  });
});
