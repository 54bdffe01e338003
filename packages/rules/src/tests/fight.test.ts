// packages/rules/src/tests/fight.test.ts

import assert from "assert";
import { test } from "node:test";
import {
  ArmySetup,
  GameAction,
  GameEvent,
  GameState,
  RulesContext,
  attackAllowance,
  effectiveInitiative,
  makeMatchView,
} from "../index";
import { accept, at, makeMatch, refuse, toPhase, unitOf } from "./helpers";

function fightMatch(
  armies: ArmySetup,
  params: { dice?: number[]; pileInOnly?: boolean } = {}
) {
  const match = makeMatch(armies, {
    dice: params.dice,
    config: params.pileInOnly ? { fightVariant: "pileInOnly" } : {},
  });
  return { ...match, state: toPhase(match.state, match.ctx, "fight") };
}

// Applies every action in order, collecting all events
function play(
  state: GameState,
  ctx: RulesContext,
  actions: GameAction[]
): { state: GameState; events: GameEvent[] } {
  let current = state;
  const events: GameEvent[] = [];
  for (const action of actions) {
    const result = accept(current, action, ctx);
    current = result.state;
    events.push(...result.events);
  }
  return { state: current, events };
}

function activate(unitId: number): GameAction[] {
  return [
    { type: "selectFighter", unitId },
    { type: "confirmPileInMove", to: null },
  ];
}

test("fight_full_activation_with_attacks", () => {
  const armies: ArmySetup = {
    P1: [{ profileId: "vanguard", position: at(0) }],
    P2: [
      { profileId: "poxwalker", position: at(20) },
      { profileId: "plagueMarine", position: at(0, 400) },
    ],
  };
  const { state, ctx, rng } = fightMatch(armies, { dice: [3, 4, 6] });
  assert.deepEqual(state.fight.engagements, [{ id: 1, participantIds: [1, 2] }]);

  assert.deepEqual(refuse(state, { type: "selectFight", unitId: 3 }, ctx), {
    code: "InvalidTarget",
    reason: "Plague Marine is not part of any fight",
  });
  assert.equal(refuse(state, { type: "resolveFight" }, ctx).code, "NoSelection");
  assert.equal(refuse(state, { type: "endTurn" }, ctx).code, "PhaseMismatch");

  let s = accept(state, { type: "selectFight", unitId: 1 }, ctx).state;
  const resolved = accept(s, { type: "resolveFight" }, ctx);
  assert.deepEqual(resolved.events, [
    { type: "initiativeRoundStarted", engagementId: 1, initiativeRound: 4, eligibleIds: [1] },
  ]);
  s = resolved.state;

  assert.deepEqual(refuse(s, { type: "selectFighter", unitId: 2 }, ctx), {
    code: "PhaseMismatch",
    reason: "it is P1's activation",
  });
  const activated = accept(s, { type: "selectFighter", unitId: 1 }, ctx);
  assert.deepEqual(activated.events, [
    { type: "fighterActivated", unitId: 1, player: "P1", attackAllowance: 2 },
  ]);
  s = activated.state;

  assert.deepEqual(refuse(s, { type: "confirmPileInMove", to: at(40) }, ctx), {
    code: "OutOfRange",
    reason: "Pile in move out of range",
  });
  assert.deepEqual(refuse(s, { type: "confirmPileInMove", to: at(0, -25) }, ctx), {
    code: "InvalidTarget",
    reason: "Must collide with at least one enemy model",
  });

  s = accept(s, { type: "confirmPileInMove", to: null }, ctx).state;
  assert.equal(s.fight.stage, "attacks");

  assert.equal(refuse(s, { type: "selectAttackTarget", targetId: 2 }, ctx).code, "NoSelection");
  assert.equal(
    refuse(s, { type: "selectWeapon", unitId: 1, weaponId: "u1-w0" }, ctx).code,
    "InvalidTarget"
  );
  s = accept(s, { type: "selectWeapon", unitId: 1, weaponId: "u1-w1" }, ctx).state;

  // WS3 hits on the 3, S5 against T3 wounds on the 4, the 6 fails a 7+ save
  const attack = accept(s, { type: "selectAttackTarget", targetId: 2 }, ctx);
  assert.equal(rng.consumed, 3);
  assert.deepEqual(
    attack.events.map((e) => e.type),
    [
      "attackResolved",
      "unitDestroyed",
      "activationEnded",
      "fightResolved",
      "fightPhaseEnded",
      "phaseStarted",
      "turnStarted",
    ]
  );
  assert.equal(attack.state.phase, "advanceFire");
  assert.equal(attack.state.fight.stage, "none");
  assert.equal(attack.state.units[2], undefined);
  assert.equal(unitOf(attack.state, 1).hasFought, true);
});

test("fight_tiers_descend_and_players_alternate", () => {
  const armies: ArmySetup = {
    P1: [
      { profileId: "vanguard", position: at(0) },
      { profileId: "ranger", position: at(0, 20) },
    ],
    P2: [
      { profileId: "blightChampion", position: at(20) },
      { profileId: "poxwalker", position: at(20, 20) },
    ],
  };
  const { state, ctx } = fightMatch(armies, { pileInOnly: true });
  assert.deepEqual(state.fight.engagements, [{ id: 1, participantIds: [1, 2, 3, 4] }]);

  let s = play(state, ctx, [{ type: "selectUnit", unitId: 1 }, { type: "resolveFight" }]).state;
  assert.deepEqual(refuse(s, { type: "selectFighter", unitId: 2 }, ctx), {
    code: "IneligibleCombatant",
    reason: "Ranger does not strike at initiative 4",
  });

  const first = play(s, ctx, activate(1));
  assert.equal(first.state.fight.activePlayer, "P2");
  assert.equal(first.state.fight.initiativeRound, 4);
  s = first.state;

  const rest = play(s, ctx, [...activate(3), ...activate(2), ...activate(4)]);
  const tiers = rest.events.flatMap((e) =>
    e.type === "initiativeRoundStarted" ? [[e.initiativeRound, ...e.eligibleIds]] : []
  );
  assert.deepEqual(tiers, [
    [3, 2],
    [1, 4],
  ]);
  assert.equal(rest.state.phase, "advanceFire");
  assert.equal(rest.events.filter((e) => e.type === "activationEnded").length, 3);
});

test("fight_turn_stays_when_opponent_has_no_eligible_fighter", () => {
  const armies: ArmySetup = {
    P1: [
      { profileId: "vanguard", position: at(0) },
      { profileId: "vanguard", position: at(0, 20) },
    ],
    P2: [{ profileId: "poxwalker", position: at(20) }],
  };
  const { state, ctx } = fightMatch(armies, { pileInOnly: true });
  const s = play(state, ctx, [
    { type: "selectFight", unitId: 1 },
    { type: "resolveFight" },
    ...activate(1),
  ]).state;

  assert.equal(s.fight.activePlayer, "P1");
  assert.equal(s.fight.initiativeRound, 4);
  assert.equal(s.fight.stage, "resolvingInitiativeRound");
});

test("charging_adds_initiative_and_an_attack", () => {
  const armies: ArmySetup = {
    P1: [{ profileId: "vanguard", position: at(0) }],
    P2: [{ profileId: "blightChampion", position: at(200) }],
  };
  const { state } = makeMatch(armies);
  const vanguard = unitOf(state, 1);
  const champion = unitOf(state, 2);

  assert.equal(effectiveInitiative({ ...vanguard, hasCharged: true }), 5);
  assert.equal(attackAllowance({ ...vanguard, hasCharged: true }), 3);
  assert.equal(attackAllowance(champion), 4);
  assert.equal(effectiveInitiative({ ...champion, initiative: 10, hasCharged: true }, 10), 10);
});

test("fight_weapon_switching_within_an_activation", () => {
  const armies: ArmySetup = {
    P1: [{ profileId: "blightChampion", position: at(0) }],
    P2: [{ profileId: "destroyer", position: at(30) }],
  };
  const { state, ctx } = fightMatch(armies, { dice: [1] });
  let s = play(state, ctx, [
    { type: "selectFight", unitId: 1 },
    { type: "resolveFight" },
    ...activate(1),
    { type: "selectWeapon", unitId: 1, weaponId: "u1-w1" },
  ]).state;

  const miss = accept(s, { type: "selectAttackTarget", targetId: 2 }, ctx);
  s = miss.state;
  assert.equal(unitOf(s, 2).wounds, 3);
  assert.equal(s.fight.stage, "attacks");
  assert.deepEqual(s.fight.activation, {
    fighterId: 1,
    attacksRemaining: 3,
    weaponId: "u1-w1",
    usedWeaponIds: ["u1-w1"],
  });

  const view = makeMatchView(s, ctx);
  assert.equal(view.units[0].attacksRemaining, 3);
  assert.deepEqual(view.legal.meleeTargetIds, [2]);

  s = accept(s, { type: "selectWeapon", unitId: 1, weaponId: "u1-w2" }, ctx).state;
  assert.deepEqual(
    refuse(s, { type: "selectWeapon", unitId: 1, weaponId: "u1-w1" }, ctx),
    { code: "IneligibleCombatant", reason: "Weapon has already been used this activation" }
  );
  assert.equal(
    refuse(s, { type: "selectWeapon", unitId: 1, weaponId: "u1-w0" }, ctx).code,
    "InvalidTarget"
  );

  const ended = accept(s, { type: "endActivation" }, ctx);
  assert.deepEqual(ended.events, [
    { type: "activationEnded", unitId: 1 },
    { type: "initiativeRoundStarted", engagementId: 1, initiativeRound: 2, eligibleIds: [2] },
  ]);
  assert.equal(ended.state.fight.activePlayer, "P2");
});

test("pile_in_move_into_contact", () => {
  const armies: ArmySetup = {
    P1: [{ profileId: "vanguard", position: at(0) }],
    P2: [
      { profileId: "poxwalker", position: at(20) },
      { profileId: "poxwalker", position: at(40) },
    ],
  };
  const { state, ctx } = fightMatch(armies, { pileInOnly: true });
  const s = play(state, ctx, [
    { type: "selectFight", unitId: 1 },
    { type: "resolveFight" },
    { type: "selectFighter", unitId: 1 },
  ]).state;

  const result = accept(s, { type: "confirmPileInMove", to: at(5, -10) }, ctx);
  assert.deepEqual(result.events, [
    { type: "pileInMoved", unitId: 1, from: at(0), to: at(5, -10) },
    { type: "activationEnded", unitId: 1 },
    { type: "initiativeRoundStarted", engagementId: 1, initiativeRound: 1, eligibleIds: [2, 3] },
  ]);
  assert.deepEqual(unitOf(result.state, 1).position, at(5, -10));
  assert.equal(result.state.fight.activePlayer, "P2");
});

test("next_fight_is_picked_by_the_player_still_engaged", () => {
  const armies: ArmySetup = {
    P1: [{ profileId: "ranger", position: at(0) }],
    P2: [
      { profileId: "poxwalker", position: at(20) },
      { profileId: "poxwalker", position: at(200) },
      { profileId: "plagueMarine", position: at(220) },
    ],
  };
  const { state, ctx } = fightMatch(armies, { pileInOnly: true });

  assert.deepEqual(refuse(state, { type: "selectFight", unitId: 3 }, ctx), {
    code: "InvalidTarget",
    reason: "You must select a fight that includes one of your own models",
  });

  const first = play(state, ctx, [
    { type: "selectFight", unitId: 1 },
    { type: "resolveFight" },
    ...activate(1),
    ...activate(2),
  ]);
  assert.deepEqual(first.events[first.events.length - 1], {
    type: "fightResolved",
    engagementId: 1,
  });
  assert.equal(first.state.fight.stage, "selectingFight");
  assert.equal(first.state.currentPlayer, "P2");
  assert.deepEqual(first.state.fight.engagements, [{ id: 2, participantIds: [3, 4] }]);

  const second = play(first.state, ctx, [
    { type: "selectFight", unitId: 3 },
    { type: "resolveFight" },
    ...activate(4),
    ...activate(3),
  ]);
  assert.equal(second.state.phase, "advanceFire");
  assert.equal(second.state.currentPlayer, "P1");
});

test("deselect_clears_the_selected_fight", () => {
  const armies: ArmySetup = {
    P1: [{ profileId: "ranger", position: at(0) }],
    P2: [{ profileId: "poxwalker", position: at(20) }],
  };
  const { state, ctx } = fightMatch(armies);
  const selected = accept(state, { type: "selectFight", unitId: 2 }, ctx).state;
  assert.equal(selected.fight.selectedEngagementId, 1);

  const cleared = accept(selected, { type: "deselect" }, ctx);
  assert.deepEqual(cleared.events, [{ type: "fightDeselected" }]);
  assert.equal(cleared.state.fight.selectedEngagementId, null);
});

test("fight_opens_with_the_player_who_has_an_engagement", () => {
  const armies: ArmySetup = {
    P1: [{ profileId: "ranger", position: at(0) }],
    P2: [
      { profileId: "poxwalker", position: at(200) },
      { profileId: "plagueMarine", position: at(220) },
    ],
  };
  const { state, ctx } = fightMatch(armies);
  assert.deepEqual(state.fight.engagements, [{ id: 1, participantIds: [2, 3] }]);
  assert.equal(state.fight.stage, "selectingFight");
  assert.equal(state.currentPlayer, "P2");
  assert.equal(makeMatchView(state, ctx).awaitingPlayer, "P2");

  const done = play(state, ctx, [
    { type: "selectFight", unitId: 2 },
    { type: "resolveFight" },
    ...activate(3),
    ...activate(2),
  ]);
  const tiers = done.events.flatMap((e) =>
    e.type === "initiativeRoundStarted" ? [[e.initiativeRound, ...e.eligibleIds]] : []
  );
  assert.deepEqual(tiers, [
    [3, 3],
    [1, 2],
  ]);
  assert.equal(done.state.phase, "advanceFire");
  assert.equal(done.state.currentPlayer, "P1");
  assert.equal(done.state.fight.stage, "none");
});

test("deselect_before_pile_in_reopens_the_fighter_pick", () => {
  const armies: ArmySetup = {
    P1: [
      { profileId: "vanguard", position: at(0) },
      { profileId: "vanguard", position: at(0, 20) },
    ],
    P2: [{ profileId: "poxwalker", position: at(20) }],
  };
  const { state, ctx } = fightMatch(armies);
  const picked = play(state, ctx, [
    { type: "selectFight", unitId: 1 },
    { type: "resolveFight" },
    { type: "selectFighter", unitId: 1 },
  ]).state;
  assert.equal(picked.fight.stage, "pileInMove");

  const backed = accept(picked, { type: "deselect" }, ctx);
  assert.deepEqual(backed.events, [{ type: "fighterDeactivated", unitId: 1 }]);
  assert.equal(backed.state.fight.stage, "resolvingInitiativeRound");
  assert.equal(backed.state.fight.activation, null);
  assert.equal(backed.state.fight.initiativeRound, 4);
  assert.equal(unitOf(backed.state, 1).hasFought, false);
  assert.deepEqual(unitOf(backed.state, 1).position, at(0));

  const other = accept(backed.state, { type: "selectFighter", unitId: 2 }, ctx);
  assert.deepEqual(other.events, [
    { type: "fighterActivated", unitId: 2, player: "P1", attackAllowance: 2 },
  ]);
  assert.equal(other.state.fight.stage, "pileInMove");
});
