/**
 * Pattern registry: the read-only set of profiles and rules for one process.
 */

import { ConfigError, InputError } from "../errors";
import { Profile, ProfileId, Rule, isApplicable } from "./rules";

export class PatternRegistry {
  private readonly profiles: readonly Profile[];
  private readonly rules: readonly Rule[];
  private readonly byId: ReadonlyMap<string, Rule>;

  /**
   * @throws ConfigError on duplicate profile or rule ids, or an escalation
   *   that names a rule the catalog does not define
   */
  constructor(profiles: readonly Profile[]) {
    const profileIds = new Set<ProfileId>();
    const byId = new Map<string, Rule>();
    const rules: Rule[] = [];

    for (const profile of profiles) {
      if (profileIds.has(profile.id)) {
        throw new ConfigError(`duplicate profile id "${profile.id}"`);
      }
      profileIds.add(profile.id);

      for (const rule of profile.rules) {
        if (byId.has(rule.id)) {
          throw new ConfigError(`duplicate rule id "${rule.id}"`, { source: profile.id });
        }
        byId.set(rule.id, rule);
        rules.push(rule);
      }
    }

    for (const rule of rules) {
      const when = rule.escalate?.when;
      if (when && "rule" in when && !byId.has(when.rule)) {
        throw new ConfigError(`escalation refers to unknown rule "${when.rule}"`, { source: rule.id });
      }
    }

    this.profiles = Object.freeze([...profiles]);
    this.rules = Object.freeze(rules);
    this.byId = byId;
  }

  /**
   * Generic rules plus the rules of every active profile, filtered by each
   * rule's applicability expression, in registration order.
   */
  rulesFor(profiles: ReadonlySet<ProfileId>): Rule[] {
    const active = new Set(this.profiles.filter((p) => p.always || profiles.has(p.id)).map((p) => p.id));
    return this.rules.filter((rule) => active.has(rule.group) && isApplicable(rule.applies, profiles));
  }

  /**
   * Stack profiles that detection can activate (generic groups excluded).
   */
  stackProfiles(): Profile[] {
    return this.profiles.filter((p) => !p.always);
  }

  allProfiles(): Profile[] {
    return [...this.profiles];
  }

  allRules(): Rule[] {
    return [...this.rules];
  }

  getRule(id: string): Rule | undefined {
    return this.byId.get(id);
  }

  /**
   * Validate a forced profile list (from --profiles or the config file).
   *
   * @throws InputError when a name is not a known stack profile
   */
  resolveProfiles(names: readonly string[]): Set<ProfileId> {
    const known = new Set(this.stackProfiles().map((p) => p.id));
    const resolved = new Set<ProfileId>();
    for (const name of names) {
      const id = name.trim();
      if (id.length === 0) continue;
      if (!known.has(id)) {
        throw new InputError(
          `Unknown profile "${id}". Known profiles: ${[...known].join(", ")}`,
          "UNKNOWN_PROFILE"
        );
      }
      resolved.add(id);
    }
    return resolved;
  }
}
