import type { Command } from "./Command";
import { Activity } from "./commands/Activity";
import { ClanInfo } from "./commands/ClanInfo";
import { Donations } from "./commands/Donations";
import { Help } from "./commands/Help";
import { Inactive } from "./commands/Inactive";
import { OpenAttacks } from "./commands/OpenAttacks";
import { Player } from "./commands/Player";
import { River } from "./commands/River";
import { Spy } from "./commands/Spy";
import { Status } from "./commands/Status";
import { Version } from "./commands/Version";
import { WarHistory } from "./commands/WarHistory";

export const Commands: Command[] = [
  Status,
  Help,
  Version,
  ClanInfo,
  Activity,
  OpenAttacks,
  River,
  Donations,
  WarHistory,
  Inactive,
  Player,
  Spy,
];
