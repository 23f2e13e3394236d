/**
 * Database Models Index
 *
 * - PWMR_JOBS    → one row per scrape job, identity of the scraped account
 * - NEXT_TARGET  → projected obligations for coming years, per job
 *
 * next_target.job_id cascades on delete so purging a job removes its targets.
 */
import {
  CreationOptional,
  DataTypes,
  ForeignKey,
  InferAttributes,
  InferCreationAttributes,
  Model,
} from "sequelize";
import sequelize from "../sequelize";

// ============================================================
// PWMR_JOBS — One row per scrape job
// ============================================================
export class PwmrJob extends Model<InferAttributes<PwmrJob>, InferCreationAttributes<PwmrJob>> {
  declare id: CreationOptional<number>;
  declare createdAt: string;
  declare typeOfEntity: string;
  declare entityName: string;
  declare email: string;
}
PwmrJob.init(
  {
    id: {
      type: DataTypes.INTEGER,
      primaryKey: true,
      autoIncrement: true,
    },
    createdAt: {
      type: DataTypes.STRING(64),
      allowNull: false,
      field: "created_at",
    },
    typeOfEntity: {
      type: DataTypes.STRING(64),
      allowNull: false,
      defaultValue: "",
      field: "type_of_entity",
    },
    entityName: {
      type: DataTypes.STRING(128),
      allowNull: false,
      defaultValue: "",
      field: "entity_name",
    },
    email: {
      type: DataTypes.STRING(256),
      allowNull: false,
      field: "email",
    },
  },
  {
    sequelize,
    tableName: "pwmr_jobs",
    timestamps: false,
  }
);

// ============================================================
// NEXT_TARGET — Next-year projections scraped for a job
// ============================================================
export class NextTarget extends Model<InferAttributes<NextTarget>, InferCreationAttributes<NextTarget>> {
  declare id: CreationOptional<number>;
  declare jobId: ForeignKey<PwmrJob["id"]>;
  declare nextYear: number;
  declare projectedAmount: number;
  declare typeOfEntity: string;
  declare entityName: string;
  declare email: string;
}
NextTarget.init(
  {
    id: {
      type: DataTypes.INTEGER,
      primaryKey: true,
      autoIncrement: true,
    },
    nextYear: {
      type: DataTypes.INTEGER,
      allowNull: false,
      defaultValue: 0,
      field: "next_year",
    },
    projectedAmount: {
      type: DataTypes.DECIMAL(15, 3),
      allowNull: false,
      defaultValue: 0,
      field: "projected_amount",
    },
    typeOfEntity: {
      type: DataTypes.STRING(64),
      allowNull: false,
      defaultValue: "",
      field: "type_of_entity",
    },
    entityName: {
      type: DataTypes.STRING(128),
      allowNull: false,
      defaultValue: "",
      field: "entity_name",
    },
    email: {
      type: DataTypes.STRING(256),
      allowNull: false,
      defaultValue: "",
      field: "email",
    },
  },
  {
    sequelize,
    tableName: "next_target",
    timestamps: false,
    indexes: [{ fields: ["job_id"] }],
  }
);

PwmrJob.hasMany(NextTarget, { foreignKey: { name: "jobId", field: "job_id", allowNull: false }, onDelete: "CASCADE" });
NextTarget.belongsTo(PwmrJob, { foreignKey: { name: "jobId", field: "job_id", allowNull: false }, onDelete: "CASCADE" });
