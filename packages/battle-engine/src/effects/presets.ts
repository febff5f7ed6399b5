import { DamageOverTimeEffect, HealOverTimeEffect, StatModifierEffect, StatusEffect } from "./effect.js";

export const commonEffects = {
  strength(duration = 3, power = 5): StatModifierEffect {
    return new StatModifierEffect("Strength", "buff", duration, { attack: power }, {
      description: `Increases attack by ${power} for ${duration} turns`,
    });
  },

  weakness(duration = 3, power = 3): StatModifierEffect {
    return new StatModifierEffect("Weakness", "debuff", duration, { attack: -power }, {
      description: `Reduces attack by ${power} for ${duration} turns`,
      target: "enemy",
    });
  },

  shield(duration = 3, defenseBonus = 10): StatModifierEffect {
    return new StatModifierEffect("Shield", "buff", duration, { defense: defenseBonus }, {
      description: `Increases defense by ${defenseBonus} for ${duration} turns`,
    });
  },

  poison(duration = 5, damage = 3): DamageOverTimeEffect {
    return new DamageOverTimeEffect("Poison", duration, damage, "poison", {
      description: `Deals ${damage} poison damage per turn for ${duration} turns`,
      target: "enemy",
    });
  },

  regeneration(duration = 5, healing = 5): HealOverTimeEffect {
    return new HealOverTimeEffect("Regeneration", duration, healing, {
      description: `Restores ${healing} health per turn for ${duration} turns`,
    });
  },

  stun(duration = 1): StatusEffect {
    return new StatusEffect("Stunned", duration, { stunned: true }, {
      description: `Unable to act for ${duration} turn(s)`,
      target: "enemy",
    });
  },
};
