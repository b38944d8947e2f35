import React from "react";
import { Canvas } from "@react-three/fiber";
import { SculptScene } from "./internal/SculptScene";
import type { SculptSceneProps } from "./internal/SculptScene";

export type SculptCanvasProps = SculptSceneProps & {
  fov?: number;
};

export function SculptCanvas(props: SculptCanvasProps): JSX.Element {
  const { fov = 50, ...sceneProps } = props;

  return (
    <Canvas camera={{ position: [0, 0, 5], fov }} style={{ width: "100%", height: "100%" }}>
      <ambientLight intensity={0.6} />
      <directionalLight position={[5, 5, 5]} intensity={0.8} />
      <SculptScene {...sceneProps} />
    </Canvas>
  );
}
