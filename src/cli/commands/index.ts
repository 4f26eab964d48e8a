export { registerBuildCommand } from "./build.js";
export { registerRenderCommand } from "./render.js";
export { registerTemplatesCommand } from "./templates.js";
