/**
 * Financial Calculator
 * Deterministic Australian tax, superannuation, emergency-fund and allocation figures.
 *
 * Every operation validates the profile first and rounds through the field builders,
 * so identical inputs and rule version always produce identical records.
 */

import { InvalidProfileError } from "../core/errors.js";
import { parseProfile, type RiskTolerance, type UserProfile } from "../schemas/profile.js";
import type { RuleTable } from "../schemas/rules.js";
import type {
  CalculationField,
  CalculationResult,
  CalculationWarning,
} from "../schemas/calculation.js";
import { field, formatAud, nonNegative, roundCurrency, roundTo } from "./fields.js";

const STANDARD_EMERGENCY_MONTHS = 6;
const CAUTIOUS_EMERGENCY_MONTHS = 9;

const GROWTH_BASE = 110;
const GROWTH_FLOOR = 20;
const RISK_ADJUSTMENT: Record<RiskTolerance, number> = {
  conservative: -10,
  balanced: 0,
  growth: 10,
};
const PRECIOUS_METALS_SLEEVE = 5;

const DEFAULT_SACRIFICE_SHARE = 0.1;
const DEFAULT_RETIREMENT_AGE = 67;
const DEFAULT_EXPECTED_RETURN = 0.07;
const SAFE_WITHDRAWAL_RATE = 0.04;

export interface RetirementOptions {
  retirementAge?: number;
  expectedReturn?: number;
  /** Net annual contributions; defaults to the employer guarantee after contributions tax */
  annualContribution?: number;
}

export interface TaxBreakdown {
  incomeTax: number;
  medicareLevy: number;
  total: number;
}

export class FinancialCalculator {
  constructor(readonly rules: RuleTable) {}

  get ruleVersion(): string {
    return this.rules.version;
  }

  // ============================================
  // EMERGENCY FUND
  // ============================================

  /**
   * Six months of expenses; nine for a conservative household on variable income
   */
  emergencyFund(input: UserProfile): CalculationResult {
    const profile = parseProfile(input);
    const months =
      profile.riskTolerance === "conservative" && profile.incomeVariable
        ? CAUTIOUS_EMERGENCY_MONTHS
        : STANDARD_EMERGENCY_MONTHS;

    return this.result("emergency-fund", [
      field("recommendedEmergencyFund", "Recommended emergency fund", profile.monthlyExpenses * months, "currency"),
      field("monthlyExpenses", "Monthly essential expenses", profile.monthlyExpenses, "currency"),
      field("monthsCovered", "Months of expenses covered", months, "count"),
    ]);
  }

  // ============================================
  // TAX
  // ============================================

  /**
   * Rate applied to the next dollar: last bracket whose inclusive lower bound is ≤ income
   */
  marginalTaxRate(annualIncome: number): number {
    let rate = 0;
    for (const bracket of this.rules.taxBrackets) {
      if (annualIncome >= bracket.lowerBound) {
        rate = bracket.rate;
      } else {
        break;
      }
    }
    return rate;
  }

  taxPayable(annualIncome: number): TaxBreakdown {
    const brackets = this.rules.taxBrackets;
    let incomeTax = 0;

    for (let i = 0; i < brackets.length; i++) {
      const lower = brackets[i].lowerBound;
      const upper = i + 1 < brackets.length ? brackets[i + 1].lowerBound : Infinity;
      if (annualIncome <= lower) break;
      incomeTax += (Math.min(annualIncome, upper) - lower) * brackets[i].rate;
    }

    const medicareLevy =
      annualIncome > this.rules.medicareLevyThreshold ? annualIncome * this.rules.medicareLevyRate : 0;

    return {
      incomeTax: roundCurrency(incomeTax),
      medicareLevy: roundCurrency(medicareLevy),
      total: roundCurrency(incomeTax + medicareLevy),
    };
  }

  incomeTax(input: UserProfile): CalculationResult {
    const profile = parseProfile(input);
    const tax = this.taxPayable(profile.annualIncome);
    const effectiveRate = profile.annualIncome > 0 ? tax.total / profile.annualIncome : 0;

    return this.result("income-tax", [
      field("taxableIncome", "Taxable income", profile.annualIncome, "currency"),
      field("incomeTax", "Income tax", tax.incomeTax, "currency"),
      field("medicareLevy", "Medicare levy", tax.medicareLevy, "currency"),
      field("totalTax", "Total tax payable", tax.total, "currency"),
      field("marginalTaxRate", "Marginal tax rate", this.marginalTaxRate(profile.annualIncome), "rate"),
      field("effectiveTaxRate", "Effective tax rate", effectiveRate, "rate"),
      nonNegative("afterTaxIncome", "After-tax income", profile.annualIncome - tax.total),
    ]);
  }

  // ============================================
  // SUPERANNUATION
  // ============================================

  superGuarantee(input: UserProfile): CalculationResult {
    const profile = parseProfile(input);
    const annual = profile.annualIncome * this.rules.superGuaranteeRate;

    return this.result("super-guarantee", [
      field("superGuaranteeRate", "Super guarantee rate", this.rules.superGuaranteeRate, "rate"),
      field("annualEmployerContribution", "Annual employer contribution", annual, "currency"),
      field("monthlyEmployerContribution", "Monthly employer contribution", annual / 12, "currency"),
    ]);
  }

  /**
   * Sacrifice suggested when the question names no amount:
   * 10% of income, limited to the cap headroom left after employer contributions
   */
  defaultSacrifice(input: UserProfile): number {
    const profile = parseProfile(input);
    const employer = profile.annualIncome * this.rules.superGuaranteeRate;
    const headroom = Math.max(0, this.rules.concessionalCap - employer);
    return roundCurrency(Math.min(profile.annualIncome * DEFAULT_SACRIFICE_SHARE, headroom));
  }

  /**
   * Benefit of salary-sacrificing `desiredSacrifice` into super.
   * Only the portion within the concessional cap is taxed at the contributions rate;
   * the remainder is reported as excess, never as an error.
   */
  superOptimisation(input: UserProfile, desiredSacrifice: number): CalculationResult {
    const profile = parseProfile(input);

    if (!Number.isFinite(desiredSacrifice) || desiredSacrifice < 0) {
      throw new InvalidProfileError(
        "Invalid profile: desiredSacrifice must be a non-negative finite amount",
        "desiredSacrifice",
        desiredSacrifice
      );
    }

    const { concessionalCap, contributionsTaxRate, superGuaranteeRate } = this.rules;
    const income = profile.annualIncome;

    const concessional = Math.min(desiredSacrifice, concessionalCap);
    const excess = Math.max(0, desiredSacrifice - concessionalCap);
    const sacrificedSalary = Math.min(concessional, income);

    const contributionsTax = concessional * contributionsTaxRate;
    const personalTaxSaved =
      this.taxPayable(income).total - this.taxPayable(income - sacrificedSalary).total;
    const netTaxBenefit = personalTaxSaved - contributionsTax;

    const warnings: CalculationWarning[] = [];
    if (excess > 0) {
      warnings.push({
        code: "excess-concessional",
        message: `${formatAud(roundCurrency(excess))} exceeds the ${formatAud(concessionalCap)} concessional cap and is taxed at your marginal rate`,
        amount: roundCurrency(excess),
      });
    }
    if (desiredSacrifice > income) {
      warnings.push({
        code: "sacrifice-exceeds-income",
        message: "Requested sacrifice is larger than annual income",
        amount: roundCurrency(desiredSacrifice - income),
      });
    }
    if (concessional > 0 && netTaxBenefit <= 0) {
      warnings.push({
        code: "no-tax-benefit",
        message: "At this income the contributions tax outweighs the personal tax saved",
      });
    }

    return this.result(
      "super-optimisation",
      [
        field("marginalTaxRate", "Marginal tax rate", this.marginalTaxRate(income), "rate"),
        field("employerContribution", "Employer super guarantee", income * superGuaranteeRate, "currency"),
        field("desiredSacrifice", "Requested salary sacrifice", desiredSacrifice, "currency"),
        field("concessionalSacrifice", "Sacrifice within concessional cap", concessional, "currency"),
        field("contributionsTax", "Contributions tax", contributionsTax, "currency"),
        field("afterTaxSuperContribution", "After-tax super contribution", concessional - contributionsTax, "currency"),
        field("personalTaxSaved", "Personal income tax saved", personalTaxSaved, "currency"),
        field("netTaxBenefit", "Net annual tax benefit", netTaxBenefit, "currency"),
        field("excessContribution", "Contribution above concessional cap", excess, "currency"),
      ],
      warnings
    );
  }

  retirementProjection(input: UserProfile, options: RetirementOptions = {}): CalculationResult {
    const profile = parseProfile(input);
    const retirementAge = options.retirementAge ?? DEFAULT_RETIREMENT_AGE;
    const expectedReturn = options.expectedReturn ?? DEFAULT_EXPECTED_RETURN;

    if (!Number.isInteger(retirementAge) || retirementAge <= 0 || retirementAge > 120) {
      throw new InvalidProfileError("Invalid profile: retirementAge must be a whole number between 1 and 120", "retirementAge", retirementAge);
    }
    if (!Number.isFinite(expectedReturn) || expectedReturn <= -1) {
      throw new InvalidProfileError("Invalid profile: expectedReturn must be greater than -100%", "expectedReturn", expectedReturn);
    }

    const contribution =
      options.annualContribution ??
      profile.annualIncome * this.rules.superGuaranteeRate * (1 - this.rules.contributionsTaxRate);
    if (!Number.isFinite(contribution) || contribution < 0) {
      throw new InvalidProfileError("Invalid profile: annualContribution must be non-negative", "annualContribution", contribution);
    }

    const years = Math.max(0, retirementAge - profile.age);
    const warnings: CalculationWarning[] = [];
    if (years === 0) {
      warnings.push({
        code: "past-retirement-age",
        message: `Already at or past retirement age ${retirementAge}; projection equals the current balance`,
      });
    }
    if (retirementAge < this.rules.preservationAge) {
      warnings.push({
        code: "before-preservation-age",
        message: `Super is preserved until age ${this.rules.preservationAge}; retiring at ${retirementAge} needs other savings until then`,
      });
    }

    const growth = (1 + expectedReturn) ** years;
    const annuityFactor = expectedReturn !== 0 ? (growth - 1) / expectedReturn : years;
    const projected = profile.superBalance * growth + contribution * annuityFactor;
    const drawdown = projected * SAFE_WITHDRAWAL_RATE;

    return this.result(
      "retirement-projection",
      [
        field("yearsToRetirement", "Years to retirement", years, "years"),
        field("expectedReturn", "Expected annual return", expectedReturn, "rate"),
        field("annualContribution", "Net annual contribution", contribution, "currency"),
        nonNegative("projectedSuperBalance", "Projected super balance", projected),
        nonNegative("annualRetirementIncome", "Annual drawdown income (4%)", drawdown),
        nonNegative("monthlyRetirementIncome", "Monthly drawdown income", drawdown / 12),
        field("agePensionEstimate", "Full age pension estimate", this.rules.agePensionAnnual, "currency"),
        nonNegative("totalAnnualIncome", "Total annual retirement income", drawdown + this.rules.agePensionAnnual),
      ],
      warnings
    );
  }

  // ============================================
  // ALLOCATION
  // ============================================

  /**
   * Age-banded growth share (110 − age, floor 20), shifted ±10 points by risk tolerance,
   * split into sleeves and renormalised to exactly 100%.
   */
  allocationStrategy(input: UserProfile): CalculationResult {
    const profile = parseProfile(input);

    const base = Math.max(GROWTH_FLOOR, Math.min(100, GROWTH_BASE - profile.age));
    const growth = clamp(base + RISK_ADJUSTMENT[profile.riskTolerance], 0, 100);
    const defensive = 100 - growth;

    const weights = renormalise([
      ["australianEquities", growth * 0.4],
      ["internationalEquities", growth * 0.6],
      ["fixedIncome", defensive * 0.7],
      ["cash", defensive * 0.3],
      ["preciousMetals", profile.riskTolerance === "conservative" ? 0 : PRECIOUS_METALS_SLEEVE],
    ]);

    const labels: Record<string, string> = {
      australianEquities: "Australian equities",
      internationalEquities: "International equities",
      fixedIncome: "Fixed income",
      cash: "Cash and term deposits",
      preciousMetals: "Precious metals",
    };

    return this.result("allocation-strategy", [
      field("growthAssetTarget", "Growth asset target before renormalising", growth, "percent"),
      ...weights.map(([name, weight]) => field(name, labels[name], weight, "percent")),
    ]);
  }

  // ============================================
  // RISK PROFILE
  // ============================================

  /**
   * Point-based capacity score from age, income, savings rate and dependents
   */
  riskAssessment(input: UserProfile): CalculationResult {
    const profile = parseProfile(input);
    const annualExpenses = profile.monthlyExpenses * 12;
    const disposable = profile.annualIncome - annualExpenses;
    const savingsRate = profile.annualIncome > 0 ? disposable / profile.annualIncome : 0;

    let score = 0;
    if (profile.age < 30) score += 3;
    else if (profile.age < 45) score += 2;
    else if (profile.age < 60) score += 1;

    if (profile.annualIncome > 150_000) score += 2;
    else if (profile.annualIncome > 75_000) score += 1;

    if (savingsRate > 0.3) score += 2;
    else if (savingsRate > 0.15) score += 1;
    else if (savingsRate < 0.05) score -= 1;

    score -= profile.dependents;

    const band =
      score >= 6
        ? { label: "Aggressive", tolerance: "growth", horizon: "Long-term (10+ years)" }
        : score >= 4
          ? { label: "Growth", tolerance: "growth", horizon: "Medium to long-term (7-15 years)" }
          : score >= 2
            ? { label: "Moderate", tolerance: "balanced", horizon: "Medium-term (5-10 years)" }
            : { label: "Conservative", tolerance: "conservative", horizon: "Short to medium-term (3-7 years)" };

    return {
      ...this.result("risk-assessment", [
        field("riskScore", "Risk capacity score", score, "count"),
        field("savingsRate", "Savings rate", savingsRate, "rate"),
        field("disposableIncome", "Annual disposable income", disposable, "currency"),
      ]),
      notes: {
        riskBand: band.label,
        suggestedTolerance: band.tolerance,
        timeHorizon: band.horizon,
      },
    };
  }

  private result(
    kind: CalculationResult["kind"],
    fields: CalculationField[],
    warnings: CalculationWarning[] = []
  ): CalculationResult {
    return { kind, ruleVersion: this.rules.version, fields, warnings };
  }
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/**
 * Scale weights to 100, round to 2 dp and push the rounding residual onto the largest weight
 */
function renormalise(raw: Array<[string, number]>): Array<[string, number]> {
  const total = raw.reduce((sum, [, w]) => sum + w, 0);
  const scaled = raw.map(([name, w]): [string, number] => [name, roundTo((w / total) * 100, 2)]);

  const residual = roundTo(100 - scaled.reduce((sum, [, w]) => sum + w, 0), 2);
  if (residual !== 0) {
    let largest = 0;
    scaled.forEach(([, w], i) => {
      if (w > scaled[largest][1]) largest = i;
    });
    scaled[largest] = [scaled[largest][0], roundTo(scaled[largest][1] + residual, 2)];
  }

  return scaled;
}
