// Self-test — runs the demo fund end to end and checks the result's shape

import type { ScanOrchestrator } from '../orchestrator/scan-orchestrator.js';
import { RISK_LEVELS } from '../types/risk.js';
import { ValidationError, errorMessage } from '../utils/errors.js';

export const SELFTEST_FUND = 'Tech Growth Fund';

export interface SelfTestCheck {
  name: string;
  passed: boolean;
  detail?: string;
}

function check(name: string, passed: boolean, detail?: string): SelfTestCheck {
  return detail === undefined || passed ? { name, passed } : { name, passed, detail };
}

export async function runSelfTest(
  orchestrator: Pick<ScanOrchestrator, 'scan' | 'summarize' | 'assessRisk'>,
  fundName: string = SELFTEST_FUND,
): Promise<SelfTestCheck[]> {
  const checks: SelfTestCheck[] = [];

  const result = await orchestrator.scan(fundName);
  checks.push(check('scan completes', result.status !== 'FAILED', result.errorSummary));
  checks.push(check('report is non-empty', result.report.trim().length > 0));
  checks.push(check('action items present', result.actionItems.length > 0));

  const risk = result.riskAnalysis;
  if (risk) {
    const m = risk.exposureMetrics;
    checks.push(
      check(
        'risk score is an integer in [0, 100]',
        Number.isInteger(risk.riskScore) && risk.riskScore >= 0 && risk.riskScore <= 100,
        `score ${risk.riskScore}`,
      ),
    );
    checks.push(check('risk level is known', RISK_LEVELS.includes(risk.overallRiskLevel), risk.overallRiskLevel));
    checks.push(
      check(
        'exposure metrics are bounded',
        [m.sectorConcentrationRisk, m.liquidityRisk].every((v) => v >= 0 && v <= 1) &&
          m.newsSentimentImpact >= -1 &&
          m.newsSentimentImpact <= 1,
      ),
    );
    const again = await orchestrator.assessRisk(fundName);
    checks.push(check('risk assessment is deterministic', JSON.stringify(again) === JSON.stringify(risk)));
  } else {
    checks.push(check('risk analysis present', false, 'scan returned no risk analysis'));
  }

  const summary = await orchestrator.summarize(fundName);
  checks.push(
    check(
      'summary lists holdings',
      summary.holdingsCount > 0 && summary.holdingsCount === summary.holdings.length,
      `${summary.holdingsCount} holdings`,
    ),
  );

  try {
    await orchestrator.scan('   ');
    checks.push(check('blank fund name is rejected', false, 'scan accepted a blank name'));
  } catch (err) {
    checks.push(check('blank fund name is rejected', err instanceof ValidationError, errorMessage(err)));
  }

  return checks;
}
