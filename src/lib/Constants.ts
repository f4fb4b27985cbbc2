export default class Constants {
  static PRECISION = 10n ** 18n;
  static PERCENTAGE_DENOMINATOR = 100n;
  static INITIAL_COLLATERAL_RATIO_PERCENTAGE = 10n; // of stable supply, required at bootstrap
  static MAX_FEE_RATE_PERCENTAGE = 100;
}
