/* src/types/analysis.ts
   Result shapes returned by the analysis layer. Keys are snake_case because
   report and UI consumers read them as-is. */

export type RiskLevel = 'High' | 'Medium' | 'Low';

/** Clause risk also admits 'Unknown' for model output that named no level. */
export type ClauseRiskLevel = RiskLevel | 'Unknown';

export type Clause = {
  type: string;
  risk_level: ClauseRiskLevel;
  explanation: string;
};

export type ContractAnalysis = {
  contract_type: string;
  /** "Role: Name" */
  parties: string[];
  /** "Date — Context" */
  dates: string[];
  /** "Amount — Purpose" */
  amounts: string[];
  clauses: Clause[];
};

export const DETECTED_RISK_FLAGS = [
  'penalty_clause',
  'indemnity_present',
  'unilateral_termination',
  'auto_renewal',
  'liability_cap_missing',
  'non_compete_present',
  'ip_transfer_present',
] as const;

export type DetectedRiskFlag = (typeof DETECTED_RISK_FLAGS)[number];

export type DetailedRisk = {
  category: string;
  description: string;
};

export type RiskAssessment = {
  /** 0–100, higher is riskier */
  overall_score: number;
  legal_risk: RiskLevel;
  financial_risk: RiskLevel;
  compliance_risk: RiskLevel;
  /** The seven known flags, plus any extra boolean flags the model reported. */
  detected_risks: Record<string, boolean>;
  detailed_risks: DetailedRisk[];
};

export type ComplianceViolation = {
  law: string;
  issue: string;
};

export type ComplianceResult = {
  is_compliant: boolean;
  applicable_laws: string[];
  violations: ComplianceViolation[];
  recommendations: string[];
};

export type ClauseDetail = {
  explanation: string;
  issues: string;
  recommendations: string;
  applicable_laws: string;
};

export type FullAnalysis = {
  analysis: ContractAnalysis;
  risk: RiskAssessment;
  compliance: ComplianceResult;
};
