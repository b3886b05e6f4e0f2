#!/usr/bin/env tsx
import { Command } from "@commander-js/extra-typings";
import { version } from "../../package.json";
import { installToPrefix } from "../index";

const program = new Command();

program
    .name("install-to-prefix")
    .version(version)
    .description(
        "Install the package under a prefix with the Debian layout, creating its dist-packages directory when missing",
    )
    .argument("<prefix>", "Installation prefix, e.g. /usr")
    .action(async (prefix) => {
        try {
            process.exitCode = await installToPrefix(prefix);
        } catch (e) {
            console.error(e);
            process.exit(1);
        }
    });

await program.parseAsync();
