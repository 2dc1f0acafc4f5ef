export const FINANCE_DISCLAIMER =
  'This assistant provides educational information only and should not be treated as financial, tax, or investment advice. ' +
  'Consult a qualified professional before making decisions.';

export function attachDisclaimer(message: string): string {
  return `${message}\n\n⚠️ ${FINANCE_DISCLAIMER}`;
}
