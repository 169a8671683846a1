import { Link } from "@tanstack/react-router";
import { describeKeyBindings } from "@/lib/life";
import { Card, CardContent, CardHeader, CardTitle } from "@/shared/ui/card";

const RULES = [
  "A live cell with fewer than two live neighbours dies.",
  "A live cell with two or three live neighbours lives on.",
  "A live cell with more than three live neighbours dies.",
  "A dead cell with exactly three live neighbours becomes alive.",
];

export default function AboutPage() {
  return (
    <Card className="max-w-xl">
      <CardHeader>
        <CardTitle>Rules & controls</CardTitle>
      </CardHeader>
      <CardContent className="space-y-4 text-sm">
        <ol className="list-decimal pl-5 space-y-1">
          {RULES.map((rule) => (
            <li key={rule}>{rule}</li>
          ))}
        </ol>
        <p className="text-muted-foreground">
          The board has hard edges: cells beyond the border always count as dead.
        </p>
        <ul className="space-y-1 font-mono">
          {describeKeyBindings().map((line) => (
            <li key={line}>{line}</li>
          ))}
          <li>KeyR: Restart from the seed</li>
          <li>KeyP: Toggle the performance overlay</li>
        </ul>
        <Link to="/" className="text-blue-600 hover:text-blue-800 font-medium">
          ← Back to the board
        </Link>
      </CardContent>
    </Card>
  );
}
