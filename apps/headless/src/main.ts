import { PerspectiveCamera, Scene } from "three";
import { consoleLogger } from "@facesculpt/command-core";
import { CameraRigController } from "@facesculpt/control-core";
import { CommandConnection, loadConnectionConfig } from "@facesculpt/command-socket";
import { FrameDriver } from "@facesculpt/placement-core";
import { ThreeSceneCollaborator } from "@facesculpt/scene-three";
import type { ShapeMesh } from "@facesculpt/scene-three";

const FRAME_MS = 1000 / 60;

function main(): void {
  const { url } = loadConnectionConfig();
  const scene = new Scene();
  const camera = new PerspectiveCamera(50, 16 / 9, 0.1, 1000);
  const connection = new CommandConnection({ url });
  const driver = new FrameDriver<ShapeMesh>({
    camera,
    rig: new CameraRigController({ initialPosition: [0, 0, 5] }),
    scene: new ThreeSceneCollaborator(scene),
    source: connection.queue,
    logger: consoleLogger,
  });

  let placedCount = 0;
  let last = Date.now();
  const timer = setInterval(() => {
    const now = Date.now();
    driver.tick((now - last) / 1000);
    last = now;
    const placed = driver.snapshot();
    if (placed.length !== placedCount) {
      placedCount = placed.length;
      consoleLogger.info(`placed ${JSON.stringify(placed[placed.length - 1])}`);
    }
  }, FRAME_MS);

  const shutdown = () => {
    clearInterval(timer);
    connection.close();
    consoleLogger.info(`stopped with ${placedCount} placed shape(s)`);
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);

  connection.open();
}

main();
