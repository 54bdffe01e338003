import type {
  ApplyResult,
  Engagement,
  FightState,
  GameAction,
  GameEvent,
  GameState,
} from "../model";
import { otherPlayer } from "../model";
import type { RulesContext } from "../context";
import { resolveAttack } from "../combat";
import { toWorld } from "../config";
import {
  attackAllowance,
  effectiveInitiative,
  eligibleFighters,
  enemiesInContact,
  engagementHasPlayer,
  engagementUnits,
  getSelectedEngagement,
  hasEligibleFighter,
  selectingPlayer,
} from "../fight";
import { findEngagementOf } from "../engagements";
import { onGround, planarDistance, unitsCollide } from "../geometry";
import { endFightPhase } from "../phases";
import { evActivationEnded, evInitiativeRoundStarted } from "../shared/events";
import { reject, setUnit } from "../shared/stateUtils";
import { findWeapon } from "../units";
import { requireUnit } from "./shared";

// Slack for pile-in destinations computed to land exactly on the reach
const REACH_TOLERANCE = 1e-6;

function withFight(state: GameState, patch: Partial<FightState>): GameState {
  return { ...state, fight: { ...state.fight, ...patch } };
}

function requireStage(
  state: GameState,
  stage: FightState["stage"],
  message: string
): ApplyResult | null {
  if (state.phase !== "fight") {
    return reject(state, "PhaseMismatch", "not in the fight phase");
  }
  if (state.fight.stage !== stage) {
    return reject(state, "PhaseMismatch", message);
  }
  return null;
}

export function applySelectFight(
  state: GameState,
  action: Extract<GameAction, { type: "selectFight" }>
): ApplyResult {
  const wrong = requireStage(state, "selectingFight", "a fight is already being resolved");
  if (wrong) return wrong;

  const found = requireUnit(state, action.unitId);
  if (!found.ok) return found.result;

  const engagement = findEngagementOf(state.fight.engagements, action.unitId);
  if (!engagement) {
    return reject(state, "InvalidTarget", `${found.unit.name} is not part of any fight`);
  }
  if (!engagementHasPlayer(state, engagement, state.currentPlayer)) {
    return reject(
      state,
      "InvalidTarget",
      "You must select a fight that includes one of your own models"
    );
  }

  return {
    state: withFight(state, { selectedEngagementId: engagement.id }),
    events: [{ type: "fightSelected", engagementId: engagement.id }],
  };
}

export function applyResolveFight(state: GameState, ctx: RulesContext): ApplyResult {
  const wrong = requireStage(state, "selectingFight", "a fight is already being resolved");
  if (wrong) return wrong;

  const engagement = getSelectedEngagement(state);
  if (!engagement) {
    return reject(state, "NoSelection", "No fight selected to resolve");
  }
  return openTier(state, ctx, engagement, ctx.config.maxInitiative, []);
}

/**
 * Walks down from `tier` to the first initiative tier with anyone left to
 * activate. P1 opens a tier unless it has nobody eligible there.
 */
function openTier(
  state: GameState,
  ctx: RulesContext,
  engagement: Engagement,
  tier: number,
  events: GameEvent[]
): ApplyResult {
  const max = ctx.config.maxInitiative;
  for (let t = tier; t >= 1; t -= 1) {
    const eligible = eligibleFighters(state, engagement, t, max);
    if (eligible.length === 0) continue;

    const activePlayer = hasEligibleFighter(eligible, "P1") ? "P1" : "P2";
    return {
      state: withFight(state, {
        stage: "resolvingInitiativeRound",
        initiativeRound: t,
        activePlayer,
        activation: null,
      }),
      events: [
        ...events,
        evInitiativeRoundStarted({
          engagementId: engagement.id,
          initiativeRound: t,
          eligibleIds: eligible.map((u) => u.id),
        }),
      ],
    };
  }
  return finishEngagement(state, ctx, engagement, events);
}

function finishEngagement(
  state: GameState,
  ctx: RulesContext,
  engagement: Engagement,
  events: GameEvent[]
): ApplyResult {
  const resolvedEvents: GameEvent[] = [
    ...events,
    { type: "fightResolved", engagementId: engagement.id },
  ];
  // Losses elsewhere can shrink another engagement below two models
  const remaining = state.fight.engagements.filter(
    (e) => e.id !== engagement.id && engagementUnits(state, e).length > 1
  );

  if (remaining.length === 0) {
    const ended = endFightPhase(state, ctx);
    return { state: ended.state, events: [...resolvedEvents, ...ended.events] };
  }

  const next = withFight(state, {
    stage: "selectingFight",
    engagements: remaining,
    selectedEngagementId: null,
    initiativeRound: ctx.config.maxInitiative,
    activation: null,
  });
  return {
    state: { ...next, currentPlayer: selectingPlayer(next) },
    events: resolvedEvents,
  };
}

export function applySelectFighter(
  state: GameState,
  action: Extract<GameAction, { type: "selectFighter" }>,
  ctx: RulesContext
): ApplyResult {
  const wrong = requireStage(
    state,
    "resolvingInitiativeRound",
    "no initiative round is waiting for a fighter"
  );
  if (wrong) return wrong;

  const engagement = getSelectedEngagement(state);
  if (!engagement) {
    return reject(state, "NoSelection", "No fight selected to resolve");
  }
  const found = requireUnit(state, action.unitId);
  if (!found.ok) return found.result;
  const fighter = found.unit;

  if (!engagement.participantIds.includes(fighter.id)) {
    return reject(state, "InvalidTarget", `${fighter.name} is not in this fight`);
  }
  if (fighter.owner !== state.fight.activePlayer) {
    return reject(
      state,
      "PhaseMismatch",
      `it is ${state.fight.activePlayer}'s activation`
    );
  }
  if (fighter.hasFought) {
    return reject(state, "IneligibleCombatant", `${fighter.name} has already fought`);
  }
  const tier = state.fight.initiativeRound;
  if (effectiveInitiative(fighter, ctx.config.maxInitiative) !== tier) {
    return reject(
      state,
      "IneligibleCombatant",
      `${fighter.name} does not strike at initiative ${tier}`
    );
  }

  const allowance = attackAllowance(fighter);
  return {
    state: withFight(state, {
      stage: "pileInMove",
      activation: {
        fighterId: fighter.id,
        attacksRemaining: allowance,
        weaponId: null,
        usedWeaponIds: [],
      },
    }),
    events: [
      {
        type: "fighterActivated",
        unitId: fighter.id,
        player: fighter.owner,
        attackAllowance: allowance,
      },
    ],
  };
}

/**
 * Pile-in: a short move from where the fighter stands now that must end in
 * contact with an enemy in the same fight. `to: null` declines the move.
 */
export function applyConfirmPileInMove(
  state: GameState,
  action: Extract<GameAction, { type: "confirmPileInMove" }>,
  ctx: RulesContext
): ApplyResult {
  const wrong = requireStage(state, "pileInMove", "no fighter is waiting to pile in");
  if (wrong) return wrong;

  const engagement = getSelectedEngagement(state);
  const activation = state.fight.activation;
  const fighter = activation ? state.units[activation.fighterId] : undefined;
  if (!engagement || !fighter) {
    return reject(state, "NoSelection", "no active fighter");
  }

  if (action.to === null) {
    return afterPileIn(state, ctx, [{ type: "pileInDeclined", unitId: fighter.id }]);
  }

  const destination = onGround(action.to, fighter.position.y);
  const reach = toWorld(ctx.config, ctx.config.pileInDistance);
  if (planarDistance(fighter.position, destination) > reach + REACH_TOLERANCE) {
    return reject(state, "OutOfRange", "Pile in move out of range");
  }

  const touchesEnemy = engagementUnits(state, engagement).some(
    (u) =>
      u.owner !== fighter.owner &&
      unitsCollide(ctx.geometry, fighter, u, destination)
  );
  if (!touchesEnemy) {
    return reject(state, "InvalidTarget", "Must collide with at least one enemy model");
  }

  const moved = { ...fighter, position: destination };
  return afterPileIn(setUnit(state, moved), ctx, [
    { type: "pileInMoved", unitId: fighter.id, from: fighter.position, to: destination },
  ]);
}

function afterPileIn(
  state: GameState,
  ctx: RulesContext,
  events: GameEvent[]
): ApplyResult {
  if (ctx.config.fightVariant === "pileInOnly") {
    return finishActivation(state, ctx, events);
  }
  const engagement = getSelectedEngagement(state);
  const activation = state.fight.activation;
  const fighter = activation ? state.units[activation.fighterId] : undefined;
  if (
    !engagement ||
    !fighter ||
    enemiesInContact(ctx, state, engagement, fighter).length === 0
  ) {
    return finishActivation(state, ctx, events);
  }
  return { state: withFight(state, { stage: "attacks" }), events };
}

export function applySelectMeleeWeapon(
  state: GameState,
  action: Extract<GameAction, { type: "selectWeapon" }>
): ApplyResult {
  const wrong = requireStage(state, "attacks", "weapons are picked after the pile-in");
  if (wrong) return wrong;

  const activation = state.fight.activation;
  const fighter = activation ? state.units[activation.fighterId] : undefined;
  if (!activation || !fighter) {
    return reject(state, "NoSelection", "no active fighter");
  }
  if (action.unitId !== fighter.id) {
    return reject(state, "IneligibleCombatant", "only the active fighter may attack");
  }

  const weapon = findWeapon(fighter, action.weaponId);
  if (!weapon) {
    return reject(state, "InvalidTarget", `${fighter.name} has no weapon ${action.weaponId}`);
  }
  if (weapon.range > 0) {
    return reject(state, "InvalidTarget", "select a melee weapon");
  }
  if (
    weapon.id !== activation.weaponId &&
    activation.usedWeaponIds.includes(weapon.id)
  ) {
    return reject(
      state,
      "IneligibleCombatant",
      "Weapon has already been used this activation"
    );
  }

  return {
    state: withFight(state, { activation: { ...activation, weaponId: weapon.id } }),
    events: [{ type: "weaponSelected", unitId: fighter.id, weaponId: weapon.id }],
  };
}

/**
 * One attack with the selected melee weapon against an enemy in base
 * contact. The activation ends by itself once attacks run out or nobody
 * is left to hit.
 */
export function applyMeleeAttack(
  state: GameState,
  action: Extract<GameAction, { type: "selectAttackTarget" }>,
  ctx: RulesContext
): ApplyResult {
  const wrong = requireStage(state, "attacks", "no fighter is ready to attack");
  if (wrong) return wrong;

  const engagement = getSelectedEngagement(state);
  const activation = state.fight.activation;
  const fighter = activation ? state.units[activation.fighterId] : undefined;
  if (!engagement || !activation || !fighter) {
    return reject(state, "NoSelection", "no active fighter");
  }
  const weapon =
    activation.weaponId !== null ? findWeapon(fighter, activation.weaponId) : undefined;
  if (!weapon) {
    return reject(state, "NoSelection", "select a melee weapon first");
  }

  const found = requireUnit(state, action.targetId);
  if (!found.ok) return found.result;
  const target = found.unit;
  if (target.owner === fighter.owner || !engagement.participantIds.includes(target.id)) {
    return reject(state, "InvalidTarget", "attack an enemy model in this fight");
  }
  if (!unitsCollide(ctx.geometry, fighter, target)) {
    return reject(state, "InvalidTarget", "target is not in base contact");
  }

  const attack = resolveAttack(
    state,
    { attackerId: fighter.id, weapon, defenderId: target.id, mode: "melee" },
    ctx.rng
  );

  const usedWeaponIds = activation.usedWeaponIds.includes(weapon.id)
    ? activation.usedWeaponIds
    : [...activation.usedWeaponIds, weapon.id];
  const attacksRemaining = activation.attacksRemaining - 1;
  const next = withFight(attack.state, {
    activation: { ...activation, attacksRemaining, usedWeaponIds },
  });

  const nextEngagement = getSelectedEngagement(next);
  const stillFighting =
    attacksRemaining > 0 &&
    nextEngagement !== null &&
    enemiesInContact(ctx, next, nextEngagement, fighter).length > 0;
  if (!stillFighting) {
    return finishActivation(next, ctx, attack.events);
  }
  return { state: next, events: attack.events };
}

export function applyEndActivation(state: GameState, ctx: RulesContext): ApplyResult {
  const wrong = requireStage(state, "attacks", "no activation to end");
  if (wrong) return wrong;
  return finishActivation(state, ctx, []);
}

/**
 * Marks the fighter as done and hands the tier to the other player when they
 * still have someone to activate. When neither side does, the next lower
 * tier opens.
 */
function finishActivation(
  state: GameState,
  ctx: RulesContext,
  events: GameEvent[]
): ApplyResult {
  const engagement = getSelectedEngagement(state);
  const activation = state.fight.activation;
  let next = state;
  const ended: GameEvent[] = [...events];

  if (activation) {
    const fighter = state.units[activation.fighterId];
    if (fighter) {
      next = setUnit(next, { ...fighter, hasFought: true });
    }
    ended.push(evActivationEnded(activation.fighterId));
  }
  next = withFight(next, { stage: "resolvingInitiativeRound", activation: null });

  if (!engagement) {
    return { state: next, events: ended };
  }

  const tier = next.fight.initiativeRound;
  const eligible = eligibleFighters(next, engagement, tier, ctx.config.maxInitiative);
  const current = next.fight.activePlayer;
  const other = otherPlayer(current);

  if (hasEligibleFighter(eligible, other)) {
    return { state: withFight(next, { activePlayer: other }), events: ended };
  }
  if (hasEligibleFighter(eligible, current)) {
    return { state: next, events: ended };
  }
  return openTier(next, ctx, engagement, tier - 1, ended);
}

// Steps back one level inside the fight flow
export function applyFightDeselect(state: GameState): ApplyResult {
  switch (state.fight.stage) {
    case "selectingFight":
      return {
        state: withFight({ ...state, selection: null }, { selectedEngagementId: null }),
        events: [{ type: "fightDeselected" }],
      };
    case "pileInMove": {
      // Nothing is committed before the pile-in, so the tier's pick reopens
      const activation = state.fight.activation;
      if (!activation) return { state, events: [] };
      return {
        state: withFight(state, { stage: "resolvingInitiativeRound", activation: null }),
        events: [{ type: "fighterDeactivated", unitId: activation.fighterId }],
      };
    }
    case "attacks": {
      const activation = state.fight.activation;
      if (activation && activation.weaponId !== null) {
        return {
          state: withFight(state, { activation: { ...activation, weaponId: null } }),
          events: [{ type: "selectionCleared" }],
        };
      }
      return { state, events: [] };
    }
    default:
      return { state, events: [] };
  }
}
