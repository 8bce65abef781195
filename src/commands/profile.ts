import { Command } from "commander";
import type { Runtime } from "../runtime.js";
import { profileApplyCommand } from "./profile-apply.js";
import { profileDiffCommand } from "./profile-diff.js";
import { profileListCommand } from "./profile-list.js";
import { profileDeleteCommand, profileRenameCommand, profileRestoreCommand } from "./profile-manage.js";
import { profileCreateCommand, profileSaveCommand } from "./profile-save.js";
import { profileShowCommand } from "./profile-show.js";
import { profileStatusCommand } from "./profile-status.js";

export function profileCommand(rt: Runtime): Command {
  return new Command("profile")
    .description("Manage and apply profiles")
    .addCommand(profileListCommand(rt))
    .addCommand(profileShowCommand(rt))
    .addCommand(profileStatusCommand(rt))
    .addCommand(profileApplyCommand(rt))
    .addCommand(profileSaveCommand(rt))
    .addCommand(profileCreateCommand(rt))
    .addCommand(profileDeleteCommand(rt))
    .addCommand(profileRestoreCommand(rt))
    .addCommand(profileRenameCommand(rt))
    .addCommand(profileDiffCommand(rt));
}
