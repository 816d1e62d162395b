#!/usr/bin/env node
import { Command } from "commander";
import { commands as scrapeCommands } from "./commands/scrape";
import { commands as postsCommands } from "./commands/posts";

const program = new Command();

program.name("company-posts").description("Collect recent posts from LinkedIn company pages").version("0.1.0");

scrapeCommands(program);
postsCommands(program);

program.parse();
