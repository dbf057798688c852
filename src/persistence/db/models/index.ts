/**
 * Database Models Index
 *
 * Sequelize models for the enforcement database:
 *
 * - AGENCY              → One row per enforcing agency (hse, ea)
 * - OFFENDER            → Organizations found in agency records
 * - ENFORCEMENT_RECORD  → Court cases, cautions and notices
 * - MATCH_REVIEW        → Ambiguous offender matches awaiting a human
 * - SCRAPE_SESSION      → Session state and counters
 *
 * Uniqueness the pipeline relies on is enforced here as well:
 * (agency_code, source_id) per record, identity_key per offender and
 * offender_id per review.
 */
import {
  CreationOptional,
  DataTypes,
  InferAttributes,
  InferCreationAttributes,
  Model,
} from "sequelize";
import type { MatchCandidate, ReviewStatus } from "../../../shared/types/offender.types";
import type {
  AgencyCode,
  BusinessType,
  EnvironmentalImpact,
  EnvironmentalReceptor,
  ResourceType,
} from "../../../shared/types/record.types";
import type {
  RangeParams,
  SessionLimits,
  SessionStatus,
  StopReason,
} from "../../../shared/types/session.types";
import sequelize from "../sequelize";

// ============================================================
// AGENCY
// ============================================================
export class AgencyModel extends Model<
  InferAttributes<AgencyModel>,
  InferCreationAttributes<AgencyModel>
> {
  declare code: AgencyCode;
  declare name: string;
  declare baseUrl: string;
  declare createdAt: CreationOptional<Date>;
  declare updatedAt: CreationOptional<Date>;
}
AgencyModel.init(
  {
    code: {
      type: DataTypes.STRING(16),
      primaryKey: true,
      field: "code",
    },
    name: {
      type: DataTypes.STRING(150),
      allowNull: false,
      field: "name",
    },
    baseUrl: {
      type: DataTypes.STRING(255),
      allowNull: false,
      field: "base_url",
    },
    createdAt: {
      type: DataTypes.DATE,
      field: "created_at",
    },
    updatedAt: {
      type: DataTypes.DATE,
      field: "updated_at",
    },
  },
  {
    sequelize,
    tableName: "AGENCY",
    modelName: "AGENCY",
    timestamps: true,
  }
);

// ============================================================
// OFFENDER
// ============================================================
export class OffenderModel extends Model<
  InferAttributes<OffenderModel>,
  InferCreationAttributes<OffenderModel>
> {
  declare id: CreationOptional<string>;
  declare name: string;
  declare normalizedName: string;
  /** normalized name + postcode */
  declare identityKey: string;
  declare registrationNumber: string | null;
  declare address: string | null;
  declare town: string | null;
  declare county: string | null;
  declare postcode: string | null;
  declare localAuthority: string | null;
  declare country: string | null;
  declare mainActivity: string | null;
  declare industry: string | null;
  declare sicCode: string | null;
  declare businessType: BusinessType;
  declare mergedIntoId: CreationOptional<string | null>;
  declare totalCases: CreationOptional<number>;
  declare totalNotices: CreationOptional<number>;
  declare totalFines: CreationOptional<number>;
  declare createdAt: CreationOptional<Date>;
  declare updatedAt: CreationOptional<Date>;
}
OffenderModel.init(
  {
    id: {
      type: DataTypes.UUID,
      defaultValue: DataTypes.UUIDV4,
      primaryKey: true,
      field: "id_offender",
    },
    name: {
      type: DataTypes.STRING(255),
      allowNull: false,
      field: "name",
    },
    normalizedName: {
      type: DataTypes.STRING(255),
      allowNull: false,
      field: "normalized_name",
    },
    identityKey: {
      type: DataTypes.STRING(300),
      allowNull: false,
      unique: true,
      field: "identity_key",
    },
    registrationNumber: {
      type: DataTypes.STRING(8),
      allowNull: true,
      field: "registration_number",
    },
    address: {
      type: DataTypes.TEXT,
      allowNull: true,
      field: "address",
    },
    town: {
      type: DataTypes.STRING(100),
      allowNull: true,
      field: "town",
    },
    county: {
      type: DataTypes.STRING(100),
      allowNull: true,
      field: "county",
    },
    postcode: {
      type: DataTypes.STRING(10),
      allowNull: true,
      field: "postcode",
    },
    localAuthority: {
      type: DataTypes.STRING(150),
      allowNull: true,
      field: "local_authority",
    },
    country: {
      type: DataTypes.STRING(64),
      allowNull: true,
      field: "country",
    },
    mainActivity: {
      type: DataTypes.STRING(255),
      allowNull: true,
      field: "main_activity",
    },
    industry: {
      type: DataTypes.STRING(255),
      allowNull: true,
      field: "industry",
    },
    sicCode: {
      type: DataTypes.STRING(16),
      allowNull: true,
      field: "sic_code",
    },
    businessType: {
      type: DataTypes.ENUM("limited_company", "plc", "llp", "partnership", "sole_trader", "other"),
      allowNull: false,
      defaultValue: "other",
      field: "business_type",
    },
    mergedIntoId: {
      type: DataTypes.UUID,
      allowNull: true,
      defaultValue: null,
      field: "merged_into_id",
    },
    totalCases: {
      type: DataTypes.INTEGER,
      allowNull: false,
      defaultValue: 0,
      field: "total_cases",
    },
    totalNotices: {
      type: DataTypes.INTEGER,
      allowNull: false,
      defaultValue: 0,
      field: "total_notices",
    },
    totalFines: {
      type: DataTypes.DOUBLE,
      allowNull: false,
      defaultValue: 0,
      field: "total_fines",
    },
    createdAt: {
      type: DataTypes.DATE,
      field: "created_at",
    },
    updatedAt: {
      type: DataTypes.DATE,
      field: "updated_at",
    },
  },
  {
    sequelize,
    tableName: "OFFENDER",
    modelName: "OFFENDER",
    timestamps: true,
    indexes: [
      { fields: ["normalized_name"] },
      { fields: ["registration_number"] },
    ],
  }
);

// ============================================================
// ENFORCEMENT_RECORD: cases and notices share one table
// ============================================================
export class EnforcementRecordModel extends Model<
  InferAttributes<EnforcementRecordModel>,
  InferCreationAttributes<EnforcementRecordModel>
> {
  declare id: CreationOptional<string>;
  declare resourceType: ResourceType;
  declare agencyCode: AgencyCode;
  declare sourceId: string;
  declare offenderId: string;
  declare actionType: string;
  declare actionDate: string | null;
  declare regulatorFunction: string | null;
  declare regulatorUrl: string;
  declare description: string | null;
  declare breaches: string | null;
  declare result: string | null;
  declare fine: number | null;
  declare costs: number | null;
  declare hearingDate: string | null;
  declare relatedCases: string | null;
  declare complianceDate: string | null;
  declare revisedComplianceDate: string | null;
  declare caseReference: string | null;
  declare eventReference: string | null;
  declare legalCitation: string | null;
  declare environmentalImpact: EnvironmentalImpact | null;
  declare environmentalReceptor: EnvironmentalReceptor | null;
  declare waterImpact: boolean;
  declare landImpact: boolean;
  declare airImpact: boolean;
  declare createdAt: CreationOptional<Date>;
  declare updatedAt: CreationOptional<Date>;
}
EnforcementRecordModel.init(
  {
    id: {
      type: DataTypes.UUID,
      defaultValue: DataTypes.UUIDV4,
      primaryKey: true,
      field: "id_enforcement_record",
    },
    resourceType: {
      type: DataTypes.ENUM("case", "notice"),
      allowNull: false,
      field: "resource_type",
    },
    agencyCode: {
      type: DataTypes.STRING(16),
      allowNull: false,
      field: "agency_code",
    },
    sourceId: {
      type: DataTypes.STRING(64),
      allowNull: false,
      field: "source_id",
    },
    offenderId: {
      type: DataTypes.UUID,
      allowNull: false,
      field: "offender_id",
    },
    actionType: {
      type: DataTypes.STRING(100),
      allowNull: false,
      field: "action_type",
    },
    actionDate: {
      type: DataTypes.DATEONLY,
      allowNull: true,
      field: "action_date",
    },
    regulatorFunction: {
      type: DataTypes.STRING(150),
      allowNull: true,
      field: "regulator_function",
    },
    regulatorUrl: {
      type: DataTypes.STRING(500),
      allowNull: false,
      field: "regulator_url",
    },
    description: {
      type: DataTypes.TEXT,
      allowNull: true,
      field: "description",
    },
    breaches: {
      type: DataTypes.TEXT,
      allowNull: true,
      field: "breaches",
    },
    result: {
      type: DataTypes.STRING(255),
      allowNull: true,
      field: "result",
    },
    fine: {
      type: DataTypes.DOUBLE,
      allowNull: true,
      field: "fine",
    },
    costs: {
      type: DataTypes.DOUBLE,
      allowNull: true,
      field: "costs",
    },
    hearingDate: {
      type: DataTypes.DATEONLY,
      allowNull: true,
      field: "hearing_date",
    },
    relatedCases: {
      type: DataTypes.TEXT,
      allowNull: true,
      field: "related_cases",
    },
    complianceDate: {
      type: DataTypes.DATEONLY,
      allowNull: true,
      field: "compliance_date",
    },
    revisedComplianceDate: {
      type: DataTypes.DATEONLY,
      allowNull: true,
      field: "revised_compliance_date",
    },
    caseReference: {
      type: DataTypes.STRING(100),
      allowNull: true,
      field: "case_reference",
    },
    eventReference: {
      type: DataTypes.STRING(100),
      allowNull: true,
      field: "event_reference",
    },
    legalCitation: {
      type: DataTypes.STRING(500),
      allowNull: true,
      field: "legal_citation",
    },
    environmentalImpact: {
      type: DataTypes.ENUM("major", "minor", "none"),
      allowNull: true,
      field: "environmental_impact",
    },
    environmentalReceptor: {
      type: DataTypes.ENUM("water", "land", "air"),
      allowNull: true,
      field: "environmental_receptor",
    },
    waterImpact: {
      type: DataTypes.BOOLEAN,
      allowNull: false,
      defaultValue: false,
      field: "water_impact",
    },
    landImpact: {
      type: DataTypes.BOOLEAN,
      allowNull: false,
      defaultValue: false,
      field: "land_impact",
    },
    airImpact: {
      type: DataTypes.BOOLEAN,
      allowNull: false,
      defaultValue: false,
      field: "air_impact",
    },
    createdAt: {
      type: DataTypes.DATE,
      field: "created_at",
    },
    updatedAt: {
      type: DataTypes.DATE,
      field: "updated_at",
    },
  },
  {
    sequelize,
    tableName: "ENFORCEMENT_RECORD",
    modelName: "ENFORCEMENT_RECORD",
    timestamps: true,
    indexes: [
      { unique: true, fields: ["agency_code", "source_id"] },
      { fields: ["offender_id"] },
      { fields: ["resource_type", "action_date"] },
    ],
  }
);

// ============================================================
// MATCH_REVIEW: at most one per offender
// ============================================================
export class MatchReviewModel extends Model<
  InferAttributes<MatchReviewModel>,
  InferCreationAttributes<MatchReviewModel>
> {
  declare id: CreationOptional<string>;
  declare offenderId: string;
  declare status: CreationOptional<ReviewStatus>;
  declare confidenceScore: number;
  declare candidateCompanies: MatchCandidate[];
  declare selectedCandidate: CreationOptional<MatchCandidate | null>;
  declare reviewNotes: CreationOptional<string | null>;
  declare reviewedBy: CreationOptional<string | null>;
  declare reviewedAt: CreationOptional<Date | null>;
  declare createdAt: CreationOptional<Date>;
  declare updatedAt: CreationOptional<Date>;
}
MatchReviewModel.init(
  {
    id: {
      type: DataTypes.UUID,
      defaultValue: DataTypes.UUIDV4,
      primaryKey: true,
      field: "id_match_review",
    },
    offenderId: {
      type: DataTypes.UUID,
      allowNull: false,
      unique: true,
      field: "offender_id",
    },
    status: {
      type: DataTypes.ENUM("pending", "approved", "skipped", "flagged"),
      allowNull: false,
      defaultValue: "pending",
      field: "status",
    },
    confidenceScore: {
      type: DataTypes.DOUBLE,
      allowNull: false,
      field: "confidence_score",
    },
    candidateCompanies: {
      type: DataTypes.JSON,
      allowNull: false,
      field: "candidate_companies",
    },
    selectedCandidate: {
      type: DataTypes.JSON,
      allowNull: true,
      field: "selected_candidate",
    },
    reviewNotes: {
      type: DataTypes.TEXT,
      allowNull: true,
      field: "review_notes",
    },
    reviewedBy: {
      type: DataTypes.STRING(255),
      allowNull: true,
      field: "reviewed_by",
    },
    reviewedAt: {
      type: DataTypes.DATE,
      allowNull: true,
      field: "reviewed_at",
    },
    createdAt: {
      type: DataTypes.DATE,
      field: "created_at",
    },
    updatedAt: {
      type: DataTypes.DATE,
      field: "updated_at",
    },
  },
  {
    sequelize,
    tableName: "MATCH_REVIEW",
    modelName: "MATCH_REVIEW",
    timestamps: true,
    indexes: [{ fields: ["status"] }],
  }
);

// ============================================================
// SCRAPE_SESSION
// ============================================================
export class ScrapeSessionModel extends Model<
  InferAttributes<ScrapeSessionModel>,
  InferCreationAttributes<ScrapeSessionModel>
> {
  declare sessionId: string;
  declare agency: AgencyCode;
  declare targetDatabase: string;
  declare rangeParams: RangeParams;
  declare limits: SessionLimits;
  declare status: SessionStatus;
  declare pagesProcessed: number;
  declare recordsFound: number;
  declare recordsCreated: number;
  declare recordsUpdated: number;
  declare recordsExisting: number;
  declare errorsCount: number;
  declare currentPage: number | null;
  declare stopReason: StopReason | null;
  declare lastError: string | null;
  declare startedAt: Date | null;
  declare finishedAt: Date | null;
  declare createdAt: Date;
  declare updatedAt: CreationOptional<Date>;
}
ScrapeSessionModel.init(
  {
    sessionId: {
      type: DataTypes.STRING(64),
      primaryKey: true,
      field: "session_id",
    },
    agency: {
      type: DataTypes.STRING(16),
      allowNull: false,
      field: "agency",
    },
    targetDatabase: {
      type: DataTypes.STRING(32),
      allowNull: false,
      field: "target_database",
    },
    rangeParams: {
      type: DataTypes.JSON,
      allowNull: false,
      field: "range_params",
    },
    limits: {
      type: DataTypes.JSON,
      allowNull: false,
      field: "limits",
    },
    status: {
      type: DataTypes.ENUM("pending", "running", "completed", "failed", "stopped"),
      allowNull: false,
      field: "status",
    },
    pagesProcessed: {
      type: DataTypes.INTEGER,
      allowNull: false,
      defaultValue: 0,
      field: "pages_processed",
    },
    recordsFound: {
      type: DataTypes.INTEGER,
      allowNull: false,
      defaultValue: 0,
      field: "records_found",
    },
    recordsCreated: {
      type: DataTypes.INTEGER,
      allowNull: false,
      defaultValue: 0,
      field: "records_created",
    },
    recordsUpdated: {
      type: DataTypes.INTEGER,
      allowNull: false,
      defaultValue: 0,
      field: "records_updated",
    },
    recordsExisting: {
      type: DataTypes.INTEGER,
      allowNull: false,
      defaultValue: 0,
      field: "records_existing",
    },
    errorsCount: {
      type: DataTypes.INTEGER,
      allowNull: false,
      defaultValue: 0,
      field: "errors_count",
    },
    currentPage: {
      type: DataTypes.INTEGER,
      allowNull: true,
      field: "current_page",
    },
    stopReason: {
      type: DataTypes.STRING(32),
      allowNull: true,
      field: "stop_reason",
    },
    lastError: {
      type: DataTypes.TEXT,
      allowNull: true,
      field: "last_error",
    },
    startedAt: {
      type: DataTypes.DATE,
      allowNull: true,
      field: "started_at",
    },
    finishedAt: {
      type: DataTypes.DATE,
      allowNull: true,
      field: "finished_at",
    },
    createdAt: {
      type: DataTypes.DATE,
      field: "created_at",
    },
    updatedAt: {
      type: DataTypes.DATE,
      field: "updated_at",
    },
  },
  {
    sequelize,
    tableName: "SCRAPE_SESSION",
    modelName: "SCRAPE_SESSION",
    timestamps: true,
    indexes: [{ fields: ["status"] }, { fields: ["created_at"] }],
  }
);

// ============================================================
// ASSOCIATIONS
// ============================================================
OffenderModel.hasMany(EnforcementRecordModel, { foreignKey: "offenderId" });
EnforcementRecordModel.belongsTo(OffenderModel, { foreignKey: "offenderId" });
AgencyModel.hasMany(EnforcementRecordModel, { foreignKey: "agencyCode" });
EnforcementRecordModel.belongsTo(AgencyModel, { foreignKey: "agencyCode" });
OffenderModel.hasOne(MatchReviewModel, { foreignKey: "offenderId" });
MatchReviewModel.belongsTo(OffenderModel, { foreignKey: "offenderId" });
