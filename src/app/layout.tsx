import type { Metadata } from "next";
import "./globals.css";

export const metadata: Metadata = {
  title: "The Shop",
  description: "Shop front with a built-in music player: autoplay, previous/next, auto-advance and a visualizer.",
};

export default function RootLayout({
  children,
}: Readonly<{
  children: React.ReactNode;
}>) {
  return (
    <html lang="en">
      <body>{children}</body>
    </html>
  );
}
