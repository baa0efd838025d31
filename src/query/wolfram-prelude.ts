/**
 * Wolfram Language definitions shared by every batched series program.
 *
 * `reducedForm[expr, assum, piece]` splits `expr` into numerator and
 * denominator factors, keeps the dominant summand of each factor under
 * `assum` and returns the simplified quotient. Every step is recorded
 * through `logForm` with the piece number, so the transcript can be read
 * per subrange.
 *
 * @packageDocumentation
 */

export const SERIES_PRELUDE = `
logMessages = {};
log[s_String] := AppendTo[logMessages, s];
logForm[label_String, value_] := log[label <> ": " <> ToString[value, InputForm]];
pieceLabel[piece_Integer, label_String] := "[piece " <> ToString[piece] <> "] " <> label;

summands[expr_] := Module[{e = Expand[expr]}, If[Head[e] === Plus, List @@ e, {e}]];

dominanceCases[terms_, assum_, vars_] := Piecewise[
  Table[{t, Reduce[assum && And @@ Thread[t >= DeleteCases[terms, t, 1, 1]], vars, Reals]}, {t, terms}]];

leadingSummand[sum_, assum_] := Module[{terms, vars, dominates, winners},
  terms = DeleteCases[summands[sum], 0];
  Which[
    terms === {}, 0,
    Length[terms] == 1, First[terms],
    True,
    vars = Variables[{sum, assum}];
    dominates[t_] := Resolve[ForAll[vars, Implies[assum, And @@ Thread[t >= DeleteCases[terms, t, 1, 1]]]], Reals];
    winners = Select[terms, TrueQ[dominates[#]] &];
    If[winners =!= {}, First[winners], Simplify[dominanceCases[terms, assum, vars], assum]]]];

factorList[expr_] := Module[{factors},
  factors = If[Head[expr] === Times, List @@ expr, {expr}];
  factors = Flatten[factors /. Power[base_, n_Integer?Positive] :> ConstantArray[base, n]];
  Select[factors, Not @* NumericQ]];

reducedForm[expr_, assum_, piece_Integer] := Module[{simplified, num, den, leadNum, leadDen},
  simplified = Simplify[expr, Assumptions -> assum];
  num = factorList[Numerator[simplified]];
  den = factorList[Denominator[simplified]];
  leadNum = Times @@ (leadingSummand[#, assum] & /@ num);
  leadDen = Times @@ (leadingSummand[#, assum] & /@ den);
  logForm[pieceLabel[piece, "numerator factors"], num];
  logForm[pieceLabel[piece, "denominator factors"], den];
  logForm[pieceLabel[piece, "leading numerator"], leadNum];
  logForm[pieceLabel[piece, "leading denominator"], leadDen];
  Simplify[leadNum / leadDen, Assumptions -> assum]];
`;
