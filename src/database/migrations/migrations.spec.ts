import { QueryInterface, Sequelize } from 'sequelize';
import * as createLeaveBalances from './20240601000001-create-leave-balances-table';
import * as createLeaveRequests from './20240601000002-create-leave-requests-table';

describe('leave migrations', () => {
  let sequelize: Sequelize;
  let queryInterface: QueryInterface;

  beforeEach(() => {
    sequelize = new Sequelize({ dialect: 'sqlite', storage: ':memory:', logging: false });
    queryInterface = sequelize.getQueryInterface();
  });

  afterEach(async () => {
    await sequelize.close();
  });

  it('creates the balance table with a unique employee/leave type index', async () => {
    await createLeaveBalances.up(queryInterface);

    const columns = await queryInterface.describeTable('leave_balances');
    expect(Object.keys(columns).sort()).toEqual([
      'createdAt',
      'employeeId',
      'id',
      'leaveType',
      'remainingDays',
      'updatedAt',
    ]);

    const createdAt = new Date('2024-06-01T00:00:00.000Z');
    await queryInterface.bulkInsert('leave_balances', [
      { employeeId: 'E1', leaveType: 'annual', remainingDays: 10, createdAt, updatedAt: createdAt },
    ]);
    await expect(
      queryInterface.bulkInsert('leave_balances', [
        { employeeId: 'E1', leaveType: 'annual', remainingDays: 3, createdAt, updatedAt: createdAt },
      ]),
    ).rejects.toThrow();
  });

  it('creates the request table', async () => {
    await createLeaveRequests.up(queryInterface);

    const columns = await queryInterface.describeTable('leave_requests');
    expect(Object.keys(columns).sort()).toEqual([
      'createdAt',
      'days',
      'employeeId',
      'endDate',
      'id',
      'leaveType',
      'startDate',
      'status',
    ]);
  });

  it('drops both tables on the way down', async () => {
    await createLeaveBalances.up(queryInterface);
    await createLeaveRequests.up(queryInterface);

    await createLeaveRequests.down(queryInterface);
    await createLeaveBalances.down(queryInterface);

    await expect(queryInterface.describeTable('leave_requests')).rejects.toThrow();
    await expect(queryInterface.describeTable('leave_balances')).rejects.toThrow();
  });
});
