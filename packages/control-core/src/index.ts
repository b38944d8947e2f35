export * from "./types";
export { CameraRigController } from "./CameraRigController";
