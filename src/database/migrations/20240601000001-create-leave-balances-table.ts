import { QueryInterface, DataTypes } from 'sequelize';

const LEAVE_TYPES = ['annual', 'sick', 'casual', 'unpaid', 'maternity', 'paternity'];

export async function up(queryInterface: QueryInterface): Promise<void> {
  await queryInterface.createTable('leave_balances', {
    id: {
      type: DataTypes.INTEGER,
      autoIncrement: true,
      primaryKey: true,
    },
    employeeId: {
      type: DataTypes.STRING(64),
      allowNull: false,
    },
    leaveType: {
      type: DataTypes.ENUM(...LEAVE_TYPES),
      allowNull: false,
    },
    remainingDays: {
      type: DataTypes.INTEGER,
      allowNull: false,
      defaultValue: 0,
    },
    createdAt: {
      type: DataTypes.DATE,
      allowNull: false,
      defaultValue: DataTypes.NOW,
    },
    updatedAt: {
      type: DataTypes.DATE,
      allowNull: false,
      defaultValue: DataTypes.NOW,
    },
  });

  // One balance row per employee and leave type; debits update it in place
  await queryInterface.addIndex('leave_balances', ['employeeId', 'leaveType'], {
    unique: true,
    name: 'leave_balances_employee_id_leave_type',
  });
}

export async function down(queryInterface: QueryInterface): Promise<void> {
  await queryInterface.dropTable('leave_balances');
  if (queryInterface.sequelize.getDialect() === 'postgres') {
    await queryInterface.sequelize.query('DROP TYPE IF EXISTS "enum_leave_balances_leaveType";');
  }
}
