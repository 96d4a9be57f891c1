import { QueryInterface, DataTypes } from 'sequelize';

const LEAVE_TYPES = ['annual', 'sick', 'casual', 'unpaid', 'maternity', 'paternity'];
const LEAVE_STATUSES = ['pending', 'accepted', 'rejected'];

export async function up(queryInterface: QueryInterface): Promise<void> {
  await queryInterface.createTable('leave_requests', {
    id: {
      type: DataTypes.UUID,
      defaultValue: DataTypes.UUIDV4,
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
    startDate: {
      type: DataTypes.DATEONLY,
      allowNull: false,
    },
    endDate: {
      type: DataTypes.DATEONLY,
      allowNull: false,
    },
    days: {
      type: DataTypes.INTEGER,
      allowNull: false,
    },
    status: {
      type: DataTypes.ENUM(...LEAVE_STATUSES),
      allowNull: false,
    },
    createdAt: {
      type: DataTypes.DATE,
      allowNull: false,
      defaultValue: DataTypes.NOW,
    },
  });

  await queryInterface.addIndex('leave_requests', ['employeeId']);
}

export async function down(queryInterface: QueryInterface): Promise<void> {
  await queryInterface.dropTable('leave_requests');
  if (queryInterface.sequelize.getDialect() === 'postgres') {
    await queryInterface.sequelize.query('DROP TYPE IF EXISTS "enum_leave_requests_leaveType";');
    await queryInterface.sequelize.query('DROP TYPE IF EXISTS "enum_leave_requests_status";');
  }
}
