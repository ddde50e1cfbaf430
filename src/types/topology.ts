/**
 * Complete topology and fare data supplied for a snapshot rebuild
 */

import type { FareRuleSet, GroupDiscountBracket, PassengerType } from './fare.js';
import type { Line, Station, TransferLink } from './network.js';

export interface TopologyData {
  stations: Station[];
  lines: Line[];
  transferLinks: TransferLink[];
  fareRules: FareRuleSet[];
  passengerTypes: PassengerType[];
  groupDiscounts: GroupDiscountBracket[];
}
