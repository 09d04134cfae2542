import { INestApplication } from '@nestjs/common';
import { Test, TestingModuleBuilder } from '@nestjs/testing';
import request from 'supertest';
import {
  FeatureRecord,
  PREDICTION_ADAPTER,
  PredictionAdapter,
} from '@admissions/model';
import { AppModule } from '../src/app.module';
import { setupApp } from '../src/app.setup';
import { CLOCK } from '../src/auth/auth.constants';
import { Clock } from '../src/auth/clock';

process.env.JWT_SECRET = 'test-secret';

const AUTH_FAILED = 'Authentication failed. Please provide a valid JWT token.';

const FEATURES: FeatureRecord = {
  GRE_Score: 337,
  TOEFL_Score: 118,
  University_Rating: 4,
  SOP: 4.5,
  LOR: 4.5,
  CGPA: 9.65,
  Research: 1,
};

async function createApp(
  configure: (builder: TestingModuleBuilder) => TestingModuleBuilder = (builder) => builder,
): Promise<INestApplication> {
  const moduleRef = await configure(
    Test.createTestingModule({ imports: [AppModule] }),
  ).compile();

  const app = moduleRef.createNestApplication({ logger: false });
  setupApp(app);
  await app.init();
  return app;
}

async function loginAs(
  app: INestApplication,
  username: string,
  password: string,
): Promise<string> {
  const res = await request(app.getHttpServer())
    .post('/login')
    .send({ username, password })
    .expect(200);

  return res.body.access_token;
}

describe('Admissions API (trained model)', () => {
  let app: INestApplication;

  beforeAll(async () => {
    app = await createApp();
  });

  afterAll(async () => {
    await app.close();
  });

  it('POST /login issues a bearer token', async () => {
    const res = await request(app.getHttpServer())
      .post('/login')
      .send({ username: 'admin', password: 'admin123' })
      .expect(200);

    expect(res.body.token_type).toBe('bearer');
    expect(res.body.access_token.split('.')).toHaveLength(3);
  });

  it('POST /login rejects a wrong password', async () => {
    const res = await request(app.getHttpServer())
      .post('/login')
      .send({ username: 'admin', password: 'wrongpassword' })
      .expect(401);

    expect(res.body.message).toBe('Incorrect username or password');
    expect(res.body.access_token).toBeUndefined();
  });

  it('POST /login rejects a body without a password', async () => {
    const res = await request(app.getHttpServer())
      .post('/login')
      .send({ username: 'admin' })
      .expect(422);

    expect(res.body.message).toContain('password is required');
  });

  it('POST /predict returns the chance of admission for a logged-in user', async () => {
    const token = await loginAs(app, 'admin', 'admin123');

    const res = await request(app.getHttpServer())
      .post('/predict')
      .set('Authorization', `Bearer ${token}`)
      .send(FEATURES)
      .expect(200);

    expect(res.body.chance_of_admit).toBeGreaterThanOrEqual(0);
    expect(res.body.chance_of_admit).toBeLessThanOrEqual(1);
    expect(res.body.chance_of_admit).toBeCloseTo(0.96871, 6);
  });

  it('GET /health reports healthy without authentication', async () => {
    const res = await request(app.getHttpServer()).get('/health').expect(200);

    expect(res.body).toEqual({ status: 'healthy' });
  });

  it('GET /health/ready reports the loaded model', async () => {
    const res = await request(app.getHttpServer())
      .get('/health/ready')
      .expect(200);

    expect(res.body.status).toBe('ok');
    expect(res.body.info.model).toEqual({
      status: 'up',
      model: 'admissions_model',
      version: '1.0.0',
    });
  });
});

describe('Admissions API (stub predictor)', () => {
  const ISSUED_AT_MS = 1_700_000_000_000;
  const LIFETIME_MS = 30 * 60 * 1000;

  let app: INestApplication;
  let now = ISSUED_AT_MS;
  const clock: Clock = { now: () => now };
  const run = jest.fn<Promise<number>, [FeatureRecord, AbortSignal?]>();
  const adapter: PredictionAdapter = { run };

  beforeAll(async () => {
    app = await createApp((builder) =>
      builder
        .overrideProvider(PREDICTION_ADAPTER)
        .useValue(adapter)
        .overrideProvider(CLOCK)
        .useValue(clock),
    );
  });

  afterAll(async () => {
    await app.close();
  });

  beforeEach(() => {
    now = ISSUED_AT_MS;
    run.mockReset();
    run.mockResolvedValue(0.42);
  });

  function predict(authorization?: string, body: object = FEATURES) {
    const req = request(app.getHttpServer()).post('/predict');
    if (authorization !== undefined) {
      req.set('Authorization', authorization);
    }
    return req.send(body);
  }

  it('runs the predictor for a token within its lifetime', async () => {
    const token = await loginAs(app, 'user', 'pass123');
    now = ISSUED_AT_MS + LIFETIME_MS - 1000;

    const res = await predict(`Bearer ${token}`).expect(200);

    expect(res.body).toEqual({ chance_of_admit: 0.42 });
    expect(run).toHaveBeenCalledTimes(1);
    expect(run).toHaveBeenCalledWith(
      expect.objectContaining(FEATURES),
      expect.any(AbortSignal),
    );
  });

  it('rejects an expired token without calling the predictor', async () => {
    const token = await loginAs(app, 'admin', 'admin123');
    now = ISSUED_AT_MS + LIFETIME_MS;

    const res = await predict(`Bearer ${token}`).expect(401);

    expect(res.body.message).toBe(AUTH_FAILED);
    expect(run).not.toHaveBeenCalled();
  });

  it.each([
    ['no Authorization header', undefined],
    ['a non-Bearer scheme', 'Basic YWRtaW46YWRtaW4xMjM='],
    ['a garbage token', 'Bearer not-a-token'],
  ])('rejects %s with the same message', async (_case, authorization) => {
    const res = await predict(authorization).expect(401);

    expect(res.body.message).toBe(AUTH_FAILED);
    expect(run).not.toHaveBeenCalled();
  });

  it('rejects a token with an altered signature', async () => {
    const token = await loginAs(app, 'admin', 'admin123');
    const [header, payload, signature] = token.split('.');
    const first = signature[0] === 'A' ? 'B' : 'A';

    const res = await predict(
      `Bearer ${header}.${payload}.${first}${signature.slice(1)}`,
    ).expect(401);

    expect(res.body.message).toBe(AUTH_FAILED);
    expect(run).not.toHaveBeenCalled();
  });

  it('authorizes before validating the body', async () => {
    await predict(undefined, { ...FEATURES, GRE_Score: 400 }).expect(401);
    expect(run).not.toHaveBeenCalled();
  });

  it('rejects an out-of-range field without calling the predictor', async () => {
    const token = await loginAs(app, 'admin', 'admin123');

    const res = await predict(`Bearer ${token}`, {
      ...FEATURES,
      GRE_Score: 400,
    }).expect(422);

    expect(res.body.message).toEqual(['GRE_Score must be at most 340']);
    expect(run).not.toHaveBeenCalled();
  });

  it('rejects fields outside the feature record', async () => {
    const token = await loginAs(app, 'admin', 'admin123');

    const res = await predict(`Bearer ${token}`, {
      ...FEATURES,
      Essay: 5,
    }).expect(422);

    expect(res.body.message).toEqual(['property Essay should not exist']);
    expect(run).not.toHaveBeenCalled();
  });

  it.each([
    ['GRE_Score', ''],
    ['TOEFL_Score', false],
  ])('rejects %s = %p instead of coercing it to 0', async (field, value) => {
    const token = await loginAs(app, 'admin', 'admin123');

    const res = await predict(`Bearer ${token}`, {
      ...FEATURES,
      [field]: value,
    }).expect(422);

    expect(res.body.message).toContain(`${field} must be an integer number`);
    expect(run).not.toHaveBeenCalled();
  });

  it('aborts the predictor when the client disconnects', async () => {
    const token = await loginAs(app, 'admin', 'admin123');
    let adapterSignal: AbortSignal | undefined;
    let markStarted: () => void = () => undefined;
    let markAborted: () => void = () => undefined;
    const started = new Promise<void>((resolve) => {
      markStarted = resolve;
    });
    const aborted = new Promise<void>((resolve) => {
      markAborted = resolve;
    });
    run.mockImplementation(
      (_record, signal) =>
        new Promise<number>((_resolve, reject) => {
          adapterSignal = signal;
          signal?.addEventListener('abort', () => {
            markAborted();
            reject(new Error('aborted'));
          });
          markStarted();
        }),
    );

    const req = predict(`Bearer ${token}`);
    const outcome = req.then(
      (res) => `answered ${res.status}`,
      (error: Error) => error.message,
    );
    await started;
    req.abort();
    await aborted;

    expect(adapterSignal?.aborted).toBe(true);
    await expect(outcome).resolves.toBe('Aborted');
  });

  it('clamps predictor output into [0, 1]', async () => {
    const token = await loginAs(app, 'admin', 'admin123');
    run.mockResolvedValue(1.7);

    const res = await predict(`Bearer ${token}`).expect(200);

    expect(res.body).toEqual({ chance_of_admit: 1 });
  });

  it('answers 500 when the predictor fails', async () => {
    const token = await loginAs(app, 'admin', 'admin123');
    run.mockRejectedValue(new Error('runner crashed'));

    const res = await predict(`Bearer ${token}`).expect(500);

    expect(res.body.message).toBe('Prediction failed. Please try again later.');
    expect(res.body.chance_of_admit).toBeUndefined();
  });

  it('reports not ready when the model probe fails', async () => {
    run.mockRejectedValue(new Error('runner crashed'));

    const res = await request(app.getHttpServer())
      .get('/health/ready')
      .expect(503);

    expect(res.body.status).toBe('error');
    expect(res.body.error.model).toEqual({
      status: 'down',
      model: 'admissions_model',
      version: '1.0.0',
      message: 'runner crashed',
    });
  });
});
