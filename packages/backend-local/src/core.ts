export * from "@planning-poker/core/index.js";
