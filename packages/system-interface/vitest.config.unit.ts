import unitTestConfig from "@l2d/vitest-config/unit";
import { mergeConfig, type UserWorkspaceConfig } from "vitest/config";

export default mergeConfig(unitTestConfig, {
    test: {
        name: "system-interface",
    },
} satisfies UserWorkspaceConfig);
