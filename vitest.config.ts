import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
    resolve: {
        alias: [
            { find: /^bytecode$/, replacement: fileURLToPath(new URL("./bytecode/src/index.ts", import.meta.url)) },
        ],
    },
    test: {
        include: ["test/**/*.test.ts"],
    },
});
