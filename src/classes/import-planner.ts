import { Dataset, PlanOptions } from '../types/dataset-types.js';
import { LogPrefixes } from '../constants/log-prefixes.js';

export class ImportPlanner {
  private verbose: boolean;

  constructor(verbose: boolean = false) {
    this.verbose = verbose;
  }

  /**
   * Selects and orders the datasets to import. The implementation guide comes
   * first because it installs profiles and search parameters the other
   * datasets may depend on; the rest keep catalog order.
   */
  plan(catalog: readonly Dataset[], options: PlanOptions = {}): Dataset[] {
    const filter = options.filter ?? '';
    const includeLegacy = options.includeLegacy ?? false;
    const filterBypassesLegacy = options.filterBypassesLegacy ?? true;

    const selected = catalog.filter(dataset => {
      if (filter && !dataset.name.includes(filter)) {
        return false;
      }
      if (dataset.isLegacy && !includeLegacy && !(filter && filterBypassesLegacy)) {
        if (this.verbose) {
          console.debug(`${LogPrefixes.SKIP} ${dataset.name} is a legacy dataset`);
        }
        return false;
      }
      return true;
    });

    const guides = selected.filter(dataset => dataset.isImplementationGuide);
    const others = selected.filter(dataset => !dataset.isImplementationGuide);
    const plan = [...guides, ...others];

    if (plan.length === 0) {
      console.info(`${LogPrefixes.PLAN} No datasets match${filter ? ` "${filter}"` : ''}`);
    } else {
      console.info(`${LogPrefixes.PLAN} ${plan.length} dataset(s) to import: ${plan.map(dataset => dataset.name).join(', ')}`);
    }
    return plan;
  }
}
