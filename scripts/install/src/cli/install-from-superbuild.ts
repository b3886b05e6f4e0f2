#!/usr/bin/env tsx
import { Command } from "@commander-js/extra-typings";
import { version } from "../../package.json";
import { installFromSuperbuild } from "../index";

const program = new Command();

program
    .name("install-from-superbuild")
    .version(version)
    .description(
        "Install the package with the default layout and link the superbuild pdal into /usr/bin",
    )
    .action(async () => {
        try {
            process.exitCode = await installFromSuperbuild();
        } catch (e) {
            console.error(e);
            process.exit(1);
        }
    });

await program.parseAsync();
