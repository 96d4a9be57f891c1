import { INestApplication } from '@nestjs/common';
import request from 'supertest';
import { configureApp } from '../../app.setup';
import { createLeaveTestingModule } from './leave.testing';
import { LEAVE_SUBMITTED_MESSAGE } from './leave.types';

const APPLY = '/api/v1/leave/apply';

describe('Leave HTTP API', () => {
  let app: INestApplication;

  const seedBalance = (employeeId: string, remainingDays: number) =>
    request(app.getHttpServer())
      .put('/api/v1/leave/balance')
      .send({ employeeId, leaveType: 'annual', remainingDays })
      .expect(200);

  const annualBalance = async (employeeId: string): Promise<unknown> => {
    const res = await request(app.getHttpServer())
      .get(`/api/v1/leave/balance/${employeeId}/annual`)
      .expect(200);
    return res.body.remainingDays;
  };

  beforeEach(async () => {
    const moduleRef = await createLeaveTestingModule();
    app = configureApp(moduleRef.createNestApplication());
    await app.init();
  });

  afterEach(async () => {
    await app.close();
  });

  describe('POST /api/v1/leave/apply', () => {
    it('accepts a request within the balance and debits it', async () => {
      await seedBalance('E1', 10);

      const res = await request(app.getHttpServer())
        .post(APPLY)
        .send({ employeeId: 'E1', leaveType: 'annual', startDate: '2024-06-01', endDate: '2024-06-03' })
        .expect(201);

      expect(Object.keys(res.body).sort()).toEqual(['message', 'requestId']);
      expect(res.body.message).toBe(LEAVE_SUBMITTED_MESSAGE);
      expect(await annualBalance('E1')).toBe(7);

      await request(app.getHttpServer())
        .get(`/api/v1/leave/requests/${String(res.body.requestId)}`)
        .expect(200)
        .expect((lookup) => {
          expect(lookup.body).toMatchObject({ employeeId: 'E1', days: 3, status: 'accepted' });
        });
    });

    it('answers 400 InvalidDateRange for an inverted range', async () => {
      await seedBalance('E1', 7);

      const res = await request(app.getHttpServer())
        .post(APPLY)
        .send({ employeeId: 'E1', leaveType: 'annual', startDate: '2024-06-05', endDate: '2024-06-01' })
        .expect(400);

      expect(res.body).toEqual({
        statusCode: 400,
        error: 'InvalidDateRange',
        message: 'End date cannot be before start date',
        path: APPLY,
        timestamp: expect.any(String),
      });
      expect(await annualBalance('E1')).toBe(7);
    });

    it('answers 422 InsufficientBalance when too few days remain', async () => {
      await seedBalance('E1', 2);

      const res = await request(app.getHttpServer())
        .post(APPLY)
        .send({ employeeId: 'E1', leaveType: 'annual', startDate: '2024-07-01', endDate: '2024-07-05' })
        .expect(422);

      expect(res.body).toMatchObject({
        statusCode: 422,
        error: 'InsufficientBalance',
        message: 'Insufficient annual leave balance: requested 5 day(s), 2 remaining',
        path: APPLY,
      });
      expect(await annualBalance('E1')).toBe(2);
    });

    it('answers 404 UnknownEmployee when no balance is recorded', async () => {
      const res = await request(app.getHttpServer())
        .post(APPLY)
        .send({ employeeId: 'E2', leaveType: 'annual', startDate: '2024-06-01', endDate: '2024-06-01' })
        .expect(404);

      expect(res.body).toMatchObject({
        statusCode: 404,
        error: 'UnknownEmployee',
        message: 'No annual leave balance recorded for employee E2',
      });
    });

    it('answers 400 MalformedRequest for a missing field', async () => {
      const res = await request(app.getHttpServer())
        .post(APPLY)
        .send({ employeeId: 'E1', leaveType: 'annual', startDate: '2024-06-01' })
        .expect(400);

      expect(res.body).toMatchObject({ statusCode: 400, error: 'MalformedRequest', path: APPLY });
      expect(res.body.message).toEqual(
        expect.arrayContaining(['endDate must be a calendar date in YYYY-MM-DD format']),
      );
    });

    it('answers 400 for a body that is not JSON', async () => {
      await request(app.getHttpServer())
        .post(APPLY)
        .set('Content-Type', 'application/json')
        .send('{"employeeId": "E1",')
        .expect(400);
    });
  });

  describe('GET /api/v1/leave/requests', () => {
    it('matches the employee id after trimming the query', async () => {
      await seedBalance('E1', 10);
      await request(app.getHttpServer())
        .post(APPLY)
        .send({ employeeId: 'E1', leaveType: 'annual', startDate: '2024-06-01', endDate: '2024-06-02' })
        .expect(201);

      const res = await request(app.getHttpServer())
        .get('/api/v1/leave/requests')
        .query({ employeeId: ' E1' })
        .expect(200);

      expect(res.body).toHaveLength(1);
    });
  });
});
