import { ImageResponse } from "next/og";

export const size = {
  width: 64,
  height: 64,
};

export const contentType = "image/png";

export default function Icon() {
  return new ImageResponse(
    (
      <div
        style={{
          height: "100%",
          width: "100%",
          display: "flex",
          alignItems: "center",
          justifyContent: "center",
          background: "#120b02",
          color: "#f59e0b",
          fontSize: 26,
          fontWeight: 900,
          letterSpacing: -1,
        }}
      >
        PVS
      </div>
    ),
    {
      ...size,
    }
  );
}
