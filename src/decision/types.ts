export type Country = 'Estonia' | 'Latvia' | 'Lithuania';

export type CreditSegment = 'Debt' | 'Segment1' | 'Segment2' | 'Segment3';

export type FailureCode =
  | 'MalformedIdentityCode'
  | 'AgeRestricted'
  | 'InvalidAmount'
  | 'InvalidPeriod'
  | 'NoValidLoan';

export type DecisionFailure = {
  code: FailureCode;
  message: string;
};

export type LoanOffer = {
  loanAmount: number;
  loanPeriod: number; // months
};

export type Decision =
  | ({ ok: true } & LoanOffer)
  | { ok: false; failure: DecisionFailure };

export type LoanRequest = {
  readonly identityCode: string;
  readonly requestedAmount: number;
  readonly requestedPeriodMonths: number;
  readonly country: Country;
};

export type DecisionConfig = {
  readonly minAmount: number;
  readonly maxAmount: number;
  readonly minPeriod: number;
  readonly maxPeriod: number;
  readonly ageOfMajority: number;
  readonly segmentModifiers: Readonly<Record<Exclude<CreditSegment, 'Debt'>, number>>;
  readonly lifeExpectancy: Readonly<Record<Country, number>>;
  readonly verifyChecksum: boolean;
};
