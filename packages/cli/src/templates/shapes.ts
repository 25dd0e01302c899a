export const shapesTemplate = `# Example drawing commands
# Set colors and draw shapes

set color blue
draw circle 400 300 50

set color red
draw rectangle 300 200 100 80

set color green
draw line 100 100 700 500

set color purple
draw circle 200 150 30

set color orange
draw rectangle 500 400 150 100
`;
